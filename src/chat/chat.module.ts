import { Module } from '@nestjs/common';
import { FollowUpModule } from '../follow-up/follow-up.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import {
  ACCOUNT_INVENTORY,
  CARD_INVENTORY,
  EVENT_PERSISTENCE,
  INTERPRETER,
} from './contracts';
import { SupabaseEventPersistence } from './services/event-persistence.service';
import { HttpInterpreterClient } from './services/interpreter.client';
import { SupabaseInventoryService } from './services/supabase-inventory.service';

@Module({
  imports: [FollowUpModule],
  controllers: [ChatController],
  providers: [
    ChatService,
    HttpInterpreterClient,
    SupabaseInventoryService,
    SupabaseEventPersistence,
    { provide: INTERPRETER, useExisting: HttpInterpreterClient },
    { provide: ACCOUNT_INVENTORY, useExisting: SupabaseInventoryService },
    { provide: CARD_INVENTORY, useExisting: SupabaseInventoryService },
    { provide: EVENT_PERSISTENCE, useExisting: SupabaseEventPersistence },
  ],
})
export class ChatModule {}
