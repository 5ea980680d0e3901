import { AccountSelectionHandler } from './account-selection.handler';
import {
  CandidateEvent,
  HoldingPayload,
  NeedsMoreInfo,
  SelectedAccountInfo,
  TransactionPayload,
} from './follow-up.types';

const tx = (data: Partial<TransactionPayload>): CandidateEvent => ({
  kind: 'transaction',
  data: {
    type: 'expense',
    amount: 30,
    category: 'food',
    description: 'lunch',
    accountName: '',
    ...data,
  },
});

const holding = (data: Partial<HoldingPayload>): CandidateEvent => ({
  kind: 'holding_update',
  data: { name: 'AAPL', action: 'buy', quantity: 10, currency: 'USD', ...data },
});

const checking: SelectedAccountInfo = {
  id: 'acc-1',
  displayName: 'Checking',
  type: 'account',
  icon: 'creditcard.fill',
};

const visa: SelectedAccountInfo = {
  id: 'card-1',
  displayName: 'Visa 4242',
  type: 'credit_card',
  icon: 'creditcard.circle.fill',
  cardIdentifier: '4242',
};

describe('AccountSelectionHandler', () => {
  const handler = new AccountSelectionHandler();

  describe('checkNeedAccountSelection', () => {
    it('returns null when every event is account-resolved', () => {
      const events: CandidateEvent[] = [
        tx({ accountName: 'Cash' }),
        tx({ cardIdentifier: '4242' }),
        holding({ accountId: 'acc-9' }),
        { kind: 'null_statement' },
      ];
      expect(handler.checkNeedAccountSelection(events)).toBeNull();
    });

    it('asks for a payment account for an unresolved expense', () => {
      const data: TransactionPayload = {
        type: 'expense',
        amount: 30,
        category: 'food',
        description: 'lunch',
        accountName: '',
      };
      const result = handler.checkNeedAccountSelection([{ kind: 'transaction', data }]);

      expect(result).toEqual({
        originalIntent: 'transaction',
        missingFields: ['source_account'],
        question: 'Please select the payment account',
        pickerCategory: 'expense_account',
        partial: { kind: 'transaction', data },
      });
    });

    it('asks for a receiving account for unresolved income', () => {
      const result = handler.checkNeedAccountSelection([
        tx({ type: 'income', description: 'salary' }),
      ]);
      expect(result?.pickerCategory).toBe('income_account');
      expect(result?.question).toBe('Please select the receiving account');
    });

    it('treats an empty card identifier as unresolved', () => {
      const result = handler.checkNeedAccountSelection([tx({ cardIdentifier: '' })]);
      expect(result?.originalIntent).toBe('transaction');
    });

    it('asks for an investment account for a holding without account', () => {
      const result = handler.checkNeedAccountSelection([holding({ accountName: '' })]);
      expect(result?.originalIntent).toBe('holding_update');
      expect(result?.pickerCategory).toBe('investment_account');
      expect(result?.missingFields).toEqual(['account']);
    });

    it('asks for an investment account for a holding named but without id', () => {
      const result = handler.checkNeedAccountSelection([
        holding({ accountName: 'Broker' }),
      ]);
      expect(result?.pickerCategory).toBe('investment_account');
    });

    it('lets the first unresolved event decide the picker', () => {
      const result = handler.checkNeedAccountSelection([
        holding({}),
        tx({ type: 'income' }),
      ]);
      expect(result?.pickerCategory).toBe('investment_account');
    });
  });

  describe('applyAccountToMultipleEvents', () => {
    it('updates only the unresolved transaction and keeps the others untouched', () => {
      const byName = tx({ accountName: 'Cash', description: 'coffee' });
      const byCard = tx({ cardIdentifier: '1111', description: 'books' });
      const open = tx({ description: 'taxi', amount: 15 });

      const { events, confirmText } = handler.applyAccountToMultipleEvents(
        [byName, byCard, open],
        checking,
      );

      expect(events[0]).toBe(byName);
      expect(events[1]).toBe(byCard);
      expect(events[2]).toEqual(tx({ description: 'taxi', amount: 15, accountName: 'Checking' }));
      expect(confirmText).toBe('OK, 3 records will use Checking');
    });

    it('sets the card identifier for a card target', () => {
      const { events } = handler.applyAccountToMultipleEvents([tx({})], visa);
      expect(events[0]).toEqual(tx({ cardIdentifier: '4242' }));
    });

    it('fills holdings only for investment pickers', () => {
      const open = holding({});

      const withoutCategory = handler.applyAccountToMultipleEvents([open], checking);
      expect(withoutCategory.events[0]).toBe(open);

      const withCategory = handler.applyAccountToMultipleEvents(
        [open],
        checking,
        'investment_account',
      );
      expect(withCategory.events[0]).toEqual(
        holding({ accountName: 'Checking', accountId: 'acc-1' }),
      );
    });
  });

  describe('createEventFromPartialData', () => {
    const txInfo = (data: Partial<TransactionPayload>): NeedsMoreInfo => ({
      originalIntent: 'transaction',
      missingFields: ['source_account'],
      question: 'Please select the payment account',
      pickerCategory: 'expense_account',
      partial: {
        kind: 'transaction',
        data: {
          type: 'expense',
          amount: 30,
          category: 'food',
          description: 'lunch',
          accountName: '',
          ...data,
        },
      },
    });

    it('builds an expense with "paid via" wording', () => {
      const result = handler.createEventFromPartialData(txInfo({}), checking);
      expect(result?.events).toEqual([tx({ accountName: 'Checking' })]);
      expect(result?.confirmText).toBe('OK, lunch expense 30, paid via Checking');
    });

    it('builds income with "stored into" wording', () => {
      const result = handler.createEventFromPartialData(
        txInfo({ type: 'income', description: 'salary', amount: 5000 }),
        checking,
      );
      expect(result?.confirmText).toBe('OK, salary income 5000, stored into Checking');
    });

    it('puts the card identifier on a card pick', () => {
      const result = handler.createEventFromPartialData(txInfo({}), visa);
      expect(result?.events).toEqual([tx({ cardIdentifier: '4242' })]);
      expect(result?.confirmText).toBe('OK, lunch expense 30, paid via Visa 4242');
    });

    it('builds a holding with the trade verb and quantity', () => {
      const info: NeedsMoreInfo = {
        originalIntent: 'holding_update',
        missingFields: ['account'],
        question: 'Please select the investment account',
        pickerCategory: 'investment_account',
        partial: {
          kind: 'holding_update',
          data: { name: 'AAPL', action: 'sell', quantity: 5, currency: 'USD' },
        },
      };
      const broker: SelectedAccountInfo = { ...checking, id: 'acc-7', displayName: 'Broker' };

      const result = handler.createEventFromPartialData(info, broker);
      expect(result?.events).toEqual([
        holding({ action: 'sell', quantity: 5, accountName: 'Broker', accountId: 'acc-7' }),
      ]);
      expect(result?.confirmText).toBe('OK, sell 5 shares of AAPL using the Broker account');
    });

    it('builds an auto-payment with the source account', () => {
      const info: NeedsMoreInfo = {
        originalIntent: 'auto_payment',
        missingFields: ['source_account'],
        question: 'Which account pays for it?',
        pickerCategory: 'auto_payment_source',
        partial: {
          kind: 'auto_payment',
          data: { name: 'Netflix', paymentType: 'subscription', amount: 15 },
        },
      };

      const result = handler.createEventFromPartialData(info, checking);
      expect(result?.events).toEqual([
        {
          kind: 'auto_payment',
          data: {
            name: 'Netflix',
            paymentType: 'subscription',
            amount: 15,
            sourceAccount: 'Checking',
          },
        },
      ]);
      expect(result?.confirmText).toBe(
        'OK, the auto-payment for Netflix will be paid from Checking',
      );
    });

    it('returns null when the partial payload is missing', () => {
      const info: NeedsMoreInfo = { ...txInfo({}), partial: null };
      expect(handler.createEventFromPartialData(info, checking)).toBeNull();
    });

    it('returns null when the partial payload does not match the intent', () => {
      const info: NeedsMoreInfo = { ...txInfo({}), originalIntent: 'holding_update' };
      expect(handler.createEventFromPartialData(info, checking)).toBeNull();
    });

    it('returns null for intents it cannot rebuild', () => {
      const info: NeedsMoreInfo = {
        originalIntent: 'budget',
        missingFields: ['account'],
        question: 'Which account?',
        partial: {
          kind: 'budget',
          data: { action: 'CREATE_SAVINGS', name: 'Trip', targetAmount: 5000 },
        },
      };
      expect(handler.createEventFromPartialData(info, checking)).toBeNull();
    });
  });
});
