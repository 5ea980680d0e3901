import { CandidateEvent } from '../../follow-up/follow-up.types';
import { buildSavedMessage, countSavedEvents } from './saved-events-summary';

const expense: CandidateEvent = {
  kind: 'transaction',
  data: {
    type: 'expense',
    amount: 30,
    category: 'food',
    description: 'lunch',
    accountName: 'Checking',
  },
};

const budget: CandidateEvent = {
  kind: 'budget',
  data: { action: 'CREATE_SAVINGS', name: 'Trip', targetAmount: 5000 },
};

const holding: CandidateEvent = {
  kind: 'holding_update',
  data: { name: 'AAPL', action: 'buy', quantity: 10, currency: 'USD', accountId: 'acc-2' },
};

describe('saved events summary', () => {
  it('counts only persistable kinds', () => {
    const counts = countSavedEvents([
      expense,
      expense,
      { kind: 'null_statement' },
      { kind: 'query_response', data: { queryType: 'balance', summary: '' } },
      budget,
    ]);

    expect(counts).toEqual({
      transaction: 2,
      asset_update: 0,
      credit_card_update: 0,
      holding_update: 0,
      budget: 1,
      auto_payment: 0,
    });
  });

  it('cheers on a batch of transactions', () => {
    expect(buildSavedMessage([expense, expense, expense])).toBe(
      'Recorded 3 transactions! Keep up the good habit 💪',
    );
  });

  const singleKind: Array<[CandidateEvent[], string]> = [
    [[holding], '✅ Holdings updated'],
    [[budget, budget], '✅ Budget set'],
    [[holding, { kind: 'null_statement' }], '✅ Holdings updated'],
  ];

  it.each(singleKind)('uses the kind-specific message for case %#', (events, message) => {
    expect(buildSavedMessage(events)).toBe(message);
  });

  it('falls back to the total for mixed batches', () => {
    expect(buildSavedMessage([expense, budget, holding])).toBe('Saved 3 records ✅');
  });

  it('reports zero when nothing was persistable', () => {
    expect(buildSavedMessage([{ kind: 'null_statement' }])).toBe('Saved 0 records ✅');
  });
});
