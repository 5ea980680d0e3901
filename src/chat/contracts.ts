import { Account, Card } from '../follow-up/accounts';
import {
  CandidateEvent,
  NeedsMoreInfo,
} from '../follow-up/follow-up.types';

// ============ Collaborator contracts ============

export const INTERPRETER = Symbol('INTERPRETER');
export const ACCOUNT_INVENTORY = Symbol('ACCOUNT_INVENTORY');
export const CARD_INVENTORY = Symbol('CARD_INVENTORY');
export const EVENT_PERSISTENCE = Symbol('EVENT_PERSISTENCE');

/** Turns free-form text into candidate events */
export interface Interpreter {
  interpret(text: string, userId: string): Promise<CandidateEvent[]>;
}

export interface AccountInventory {
  listAccounts(userId: string): Promise<Account[]>;
}

export interface CardInventory {
  listCards(userId: string): Promise<Card[]>;
}

export interface EventPersistence {
  /** Returns how many events were stored */
  save(userId: string, events: CandidateEvent[]): Promise<number>;
}

// ============ Interpreter wire format ============

export interface InterpretRequest {
  text: string;
  user_id: string;
}

export interface InterpretResponse {
  events: unknown[];
}

// ============ Replies ============

export type ChatReply =
  | { kind: 'text'; text: string; error?: boolean }
  | {
      kind: 'picker';
      needsMoreInfo: NeedsMoreInfo;
      accounts: Account[];
      cards: Card[];
    }
  | { kind: 'event_cards'; events: CandidateEvent[]; confirmText?: string }
  | { kind: 'nothing' };

export interface ConfirmResult {
  ok: true;
  savedCount: number;
  message: string;
}

export interface SessionOverview {
  hasPendingFollowUp: boolean;
  hasPendingTransactionsForNewAccount: boolean;
  pendingPartialData: NeedsMoreInfo | null;
}

// ============ Errors ============

export type InterpreterErrorCode =
  | 'NOT_CONFIGURED'
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'UNAVAILABLE'
  | 'CIRCUIT_OPEN';

export class InterpreterError extends Error {
  constructor(
    public readonly code: InterpreterErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'InterpreterError';
  }
}

export type PersistenceErrorCode = 'WRITE_FAILED' | 'NOT_CONFIGURED';

export class PersistenceError extends Error {
  constructor(
    public readonly code: PersistenceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/** Thrown when another turn for the same user is still running */
export class TurnInProgressError extends Error {
  constructor(public readonly userId: string) {
    super('Still processing your previous message, give me a moment...');
    this.name = 'TurnInProgressError';
  }
}
