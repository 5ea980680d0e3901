import { CandidateEvent } from '../../follow-up/follow-up.types';

type SavedKind =
  | 'transaction'
  | 'asset_update'
  | 'credit_card_update'
  | 'holding_update'
  | 'budget'
  | 'auto_payment';

export type SavedCounts = Record<SavedKind, number>;

const SAVED_KINDS: readonly SavedKind[] = [
  'transaction',
  'asset_update',
  'credit_card_update',
  'holding_update',
  'budget',
  'auto_payment',
];

const SINGLE_KIND_MESSAGES: Record<SavedKind, (count: number) => string> = {
  transaction: (n) => `Recorded ${n} transactions! Keep up the good habit 💪`,
  asset_update: () => '✅ Asset details updated',
  credit_card_update: () => '✅ Credit card details updated',
  holding_update: () => '✅ Holdings updated',
  budget: () => '✅ Budget set',
  auto_payment: () => '✅ Auto-payment set',
};

export function countSavedEvents(events: CandidateEvent[]): SavedCounts {
  const counts: SavedCounts = {
    transaction: 0,
    asset_update: 0,
    credit_card_update: 0,
    holding_update: 0,
    budget: 0,
    auto_payment: 0,
  };

  for (const event of events) {
    switch (event.kind) {
      case 'query_response':
      case 'null_statement':
      case 'need_more_info':
        break;
      default:
        counts[event.kind]++;
    }
  }
  return counts;
}

/**
 * Confirmation shown after a batch is stored. A batch of a single kind gets
 * that kind's message, anything else the generic count.
 */
export function buildSavedMessage(events: CandidateEvent[]): string {
  const counts = countSavedEvents(events);
  const present = SAVED_KINDS.filter((kind) => counts[kind] > 0);

  if (present.length === 1) {
    const [kind] = present;
    return SINGLE_KIND_MESSAGES[kind](counts[kind]);
  }

  const total = SAVED_KINDS.reduce((sum, kind) => sum + counts[kind], 0);
  return `Saved ${total} records ✅`;
}
