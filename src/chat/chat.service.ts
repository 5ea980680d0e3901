import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { RedisKeys, RedisService, RedisTTL } from '../redis';
import { debugLog } from '../common/utils/debug-logger';
import { Account } from '../follow-up/accounts';
import { eligibleAccounts } from '../follow-up/account-eligibility';
import { EventGuardrailsService } from '../follow-up/event-guardrails.service';
import { FollowUpManager, FollowUpResult } from '../follow-up/follow-up.manager';
import { FollowUpSessionService } from '../follow-up/follow-up-session.service';
import {
  CandidateEvent,
  FollowUpSession,
  NeedsMoreInfo,
  SelectedAccountInfo,
} from '../follow-up/follow-up.types';
import {
  ACCOUNT_INVENTORY,
  AccountInventory,
  CARD_INVENTORY,
  CardInventory,
  ChatReply,
  ConfirmResult,
  EVENT_PERSISTENCE,
  EventPersistence,
  INTERPRETER,
  Interpreter,
  InterpreterError,
  SessionOverview,
  TurnInProgressError,
} from './contracts';
import { buildSavedMessage } from './services/saved-events-summary';

export const EMPTY_BATCH_MESSAGE =
  "Sorry, I couldn't find any bookkeeping details in that. Try describing it another way.";
export const NOTHING_PENDING_MESSAGE =
  'There is nothing waiting for an account right now.';
export const LOST_RECORD_MESSAGE =
  'Sorry, I lost track of that record. Please describe it again.';

/**
 * One conversational turn at a time per user.
 *
 * Loads the follow-up session, lets the manager decide, stores the session
 * it hands back and turns the decision into a reply.
 */
@Injectable()
export class ChatService {
  private readonly log = new Logger(ChatService.name);

  constructor(
    private readonly redis: RedisService,
    private readonly sessions: FollowUpSessionService,
    private readonly followUp: FollowUpManager,
    private readonly guardrails: EventGuardrailsService,
    @Inject(INTERPRETER) private readonly interpreter: Interpreter,
    @Inject(ACCOUNT_INVENTORY) private readonly accounts: AccountInventory,
    @Inject(CARD_INVENTORY) private readonly cards: CardInventory,
    @Inject(EVENT_PERSISTENCE) private readonly persistence: EventPersistence,
  ) {}

  /**
   * A free-text message. A pending text follow-up turns the reply into a
   * full statement first; a pending picker is abandoned.
   */
  async handleMessage(userId: string, text: string): Promise<ChatReply> {
    return this.withTurnLock<ChatReply>(userId, async (cid) => {
      debugLog.chat.recv('Message', { userId, text }, cid);
      let session = await this.sessions.load(userId);
      let input = text;

      const pending = session.pendingPartialData;
      if (pending && !pending.pickerCategory) {
        const combined = this.followUp.buildCombinedTextForFollowUp(session, text);
        session = combined.session;
        input = combined.text ?? text;
        debugLog.followUp.pending('Reply merged into follow-up', {
          intent: pending.originalIntent,
          input,
        }, cid);
      } else if (pending) {
        session = this.followUp.cancelFollowUp(session);
        debugLog.followUp.pending('Picker abandoned for a new message', {}, cid);
      }

      let events: CandidateEvent[];
      try {
        events = await this.interpreter.interpret(input, userId);
      } catch (err) {
        if (!(err instanceof InterpreterError)) throw err;
        debugLog.chat.err('Interpreter failed', { code: err.code }, cid);
        await this.sessions.save(userId, session);
        return { kind: 'text', text: `Parsing failed: ${err.message}`, error: true };
      }

      const available = await this.accounts.listAccounts(userId);
      const decided = this.followUp.processParseResult(session, events, available);
      await this.sessions.save(userId, decided.session);

      return this.toReply(userId, decided.result, available, cid);
    });
  }

  /**
   * The user picked an account in the chooser. A batch that still lacks an
   * account of another category goes through the manager again.
   */
  async selectAccount(
    userId: string,
    selected: SelectedAccountInfo,
  ): Promise<ChatReply> {
    return this.withTurnLock<ChatReply>(userId, async (cid) => {
      debugLog.followUp.pick('Account selected', { userId, account: selected.displayName }, cid);
      const session = await this.sessions.load(userId);
      const descriptor = session.pendingPartialData;
      if (!descriptor) {
        return { kind: 'text', text: NOTHING_PENDING_MESSAGE };
      }

      const picked = this.followUp.handlePickerSelection(session, selected, descriptor);
      if (!picked.resolution) {
        this.log.warn(`[selectAccount] No event rebuilt for ${descriptor.originalIntent}`);
        await this.sessions.save(userId, picked.session);
        return { kind: 'text', text: LOST_RECORD_MESSAGE };
      }

      const { events, confirmText } = picked.resolution;
      const available = await this.accounts.listAccounts(userId);
      const decided = this.followUp.processParseResult(picked.session, events, available);
      await this.sessions.save(userId, decided.session);

      if (decided.result.type === 'show_event_cards') {
        return { kind: 'event_cards', events, confirmText };
      }
      return this.toReply(userId, decided.result, available, cid);
    });
  }

  /**
   * Stores the events the user confirmed on the cards.
   */
  async confirm(userId: string, rawEvents: unknown[]): Promise<ConfirmResult> {
    return this.withTurnLock<ConfirmResult>(userId, async (cid) => {
      const { events, rejected } = this.guardrails.validateAll(rawEvents);
      if (rejected.length > 0) {
        throw new BadRequestException(`Invalid events: ${rejected.join('; ')}`);
      }
      const unresolved = this.followUp.findUnresolvedAccount(events);
      if (unresolved) {
        throw new BadRequestException(
          `A ${unresolved.originalIntent} event has no account yet`,
        );
      }

      const savedCount = await this.persistence.save(userId, events);
      const message = buildSavedMessage(events);
      debugLog.chat.send(message, { userId, savedCount }, cid);
      return { ok: true, savedCount, message };
    });
  }

  async cancel(userId: string, discardNewAccountStash = false): Promise<void> {
    await this.withTurnLock(userId, async (cid) => {
      let session = this.followUp.cancelFollowUp(await this.sessions.load(userId));
      if (discardNewAccountStash) {
        session = this.followUp.clearPendingTransactionsForNewAccount(session);
      }
      await this.sessions.save(userId, session);
      debugLog.followUp.follow('Follow-up cancelled', { userId, discardNewAccountStash }, cid);
    });
  }

  /**
   * Links the batch stashed for lack of an account to the account the user
   * has just created.
   */
  async accountCreated(userId: string, account: Account): Promise<ChatReply> {
    return this.withTurnLock<ChatReply>(userId, async (cid) => {
      const session = await this.sessions.load(userId);
      const linked = this.followUp.applyPendingTransactionsToNewAccount(session, account);
      if (!linked.resolution) return { kind: 'nothing' };

      await this.sessions.save(userId, linked.session);
      debugLog.followUp.pick('Stashed records linked', {
        userId,
        account: account.name,
        count: linked.resolution.events.length,
      }, cid);
      return {
        kind: 'event_cards',
        events: linked.resolution.events,
        confirmText: linked.resolution.confirmText,
      };
    });
  }

  async getSession(userId: string): Promise<SessionOverview> {
    const session: FollowUpSession = await this.sessions.load(userId);
    return {
      hasPendingFollowUp: this.followUp.hasPendingFollowUp(session),
      hasPendingTransactionsForNewAccount:
        this.followUp.hasPendingTransactionsForNewAccount(session),
      pendingPartialData: session.pendingPartialData,
    };
  }

  // =========================================================================
  // Helpers
  // =========================================================================

  private async toReply(
    userId: string,
    result: FollowUpResult,
    available: Account[],
    cid: string,
  ): Promise<ChatReply> {
    debugLog.followUp.follow(result.type, { userId }, cid);

    switch (result.type) {
      case 'show_text_follow_up':
        return { kind: 'text', text: result.question };
      case 'show_picker_follow_up':
        return this.buildPicker(userId, result.needsMoreInfo, available);
      case 'show_event_cards':
        if (result.events.length === 0) {
          return { kind: 'text', text: EMPTY_BATCH_MESSAGE };
        }
        return { kind: 'event_cards', events: result.events };
      case 'no_accounts_guidance':
        return { kind: 'text', text: result.message };
      case 'no_follow_up_needed':
        return { kind: 'text', text: EMPTY_BATCH_MESSAGE };
    }
  }

  private async buildPicker(
    userId: string,
    needsMoreInfo: NeedsMoreInfo,
    available: Account[],
  ): Promise<ChatReply> {
    const category = needsMoreInfo.pickerCategory;
    const offersCards =
      category === 'expense_account' || category === 'credit_card';

    return {
      kind: 'picker',
      needsMoreInfo,
      accounts: eligibleAccounts(category, available),
      cards: offersCards ? await this.cards.listCards(userId) : [],
    };
  }

  private async withTurnLock<T>(
    userId: string,
    turn: (cid: string) => Promise<T>,
  ): Promise<T> {
    const key = RedisKeys.lock(userId);
    const token = await this.redis.acquireLock(key, RedisTTL.LOCK * 1000);
    if (!token) {
      this.log.warn(`[lock] Turn already running for user ${userId}`);
      throw new TurnInProgressError(userId);
    }

    const cid = randomUUID().slice(0, 8);
    const done = debugLog.chat.timer('turn', cid);
    try {
      return await turn(cid);
    } finally {
      done();
      await this.redis.releaseLock(key, token);
    }
  }
}
