import { Inject, Injectable, Logger } from '@nestjs/common';
import { SupabaseClient } from '@supabase/supabase-js';
import {
  isTransientDbError,
  withRetry,
} from '../../common/utils/resilience';
import { debugLog } from '../../common/utils/debug-logger';
import { CandidateEvent } from '../../follow-up/follow-up.types';
import { EventPersistence, PersistenceError } from '../contracts';

export interface FinancialEventRow {
  user_id: string;
  event_type: string;
  payload: object;
  source: 'chat';
}

/**
 * Rows for the events that describe something to store. Queries, null
 * statements and open questions are not persisted.
 */
export function toEventRows(
  userId: string,
  events: CandidateEvent[],
): FinancialEventRow[] {
  const rows: FinancialEventRow[] = [];
  for (const event of events) {
    switch (event.kind) {
      case 'transaction':
      case 'asset_update':
      case 'credit_card_update':
      case 'holding_update':
      case 'budget':
      case 'auto_payment':
        rows.push({
          user_id: userId,
          event_type: event.kind,
          payload: event.data,
          source: 'chat',
        });
        break;
      default:
        break;
    }
  }
  return rows;
}

@Injectable()
export class SupabaseEventPersistence implements EventPersistence {
  private readonly log = new Logger(SupabaseEventPersistence.name);

  constructor(@Inject('SUPABASE') private readonly supabase: SupabaseClient) {}

  async save(userId: string, events: CandidateEvent[]): Promise<number> {
    const rows = toEventRows(userId, events);
    if (rows.length === 0) return 0;

    try {
      await withRetry(
        async () => {
          const { error } = await this.supabase
            .from('financial_events')
            .insert(rows);
          if (error) throw error;
        },
        { maxAttempts: 3, shouldRetry: isTransientDbError },
      );
    } catch (err) {
      const reason = errorMessage(err);
      this.log.error(`[save] Insert failed for user ${userId}: ${reason}`);
      throw new PersistenceError(
        'WRITE_FAILED',
        `Could not save your records: ${reason}`,
      );
    }

    debugLog.store.ok('Events saved', { userId, count: rows.length });
    return rows.length;
  }
}

function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err) {
    return String(err.message);
  }
  return String(err);
}
