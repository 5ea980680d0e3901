import {
  BadGatewayException,
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpException,
  InternalServerErrorException,
  Logger,
  Param,
  Post,
} from '@nestjs/common';
import { ChatService } from './chat.service';
import {
  ChatReply,
  ConfirmResult,
  PersistenceError,
  SessionOverview,
  TurnInProgressError,
} from './contracts';
import { AccountCreatedDto } from './dto/account-created.dto';
import { ConfirmDto } from './dto/confirm.dto';
import { CancelDto, MessageDto } from './dto/message.dto';
import { SelectAccountDto } from './dto/select-account.dto';

@Controller('chat')
export class ChatController {
  private readonly log = new Logger(ChatController.name);

  constructor(private readonly chat: ChatService) {}

  @Post('message')
  @HttpCode(200)
  async message(@Body() body: MessageDto): Promise<ChatReply> {
    try {
      return await this.chat.handleMessage(body.userId, body.text);
    } catch (err) {
      throw this.toHttpError('message', err);
    }
  }

  @Post('select-account')
  @HttpCode(200)
  async selectAccount(@Body() body: SelectAccountDto): Promise<ChatReply> {
    try {
      return await this.chat.selectAccount(body.userId, body.account);
    } catch (err) {
      throw this.toHttpError('select-account', err);
    }
  }

  @Post('confirm')
  @HttpCode(200)
  async confirm(@Body() body: ConfirmDto): Promise<ConfirmResult> {
    try {
      return await this.chat.confirm(body.userId, body.events);
    } catch (err) {
      throw this.toHttpError('confirm', err);
    }
  }

  @Post('cancel')
  @HttpCode(200)
  async cancel(@Body() body: CancelDto): Promise<{ ok: true }> {
    try {
      await this.chat.cancel(body.userId, body.discardNewAccountStash);
      return { ok: true };
    } catch (err) {
      throw this.toHttpError('cancel', err);
    }
  }

  @Post('account-created')
  @HttpCode(200)
  async accountCreated(@Body() body: AccountCreatedDto): Promise<ChatReply> {
    try {
      return await this.chat.accountCreated(body.userId, body.account);
    } catch (err) {
      throw this.toHttpError('account-created', err);
    }
  }

  @Get('session/:userId')
  async session(@Param('userId') userId: string): Promise<SessionOverview> {
    return this.chat.getSession(userId);
  }

  private toHttpError(route: string, err: unknown): HttpException {
    if (err instanceof HttpException) return err;
    if (err instanceof TurnInProgressError) {
      return new ConflictException(err.message);
    }
    if (err instanceof PersistenceError) {
      return new BadGatewayException(err.message);
    }

    this.log.error(`[${route}] Unexpected error: ${String(err)}`);
    return new InternalServerErrorException('Something went wrong, please try again.');
  }
}
