import { Account } from './accounts';
import { eligibleAccounts, hasEligibleTarget } from './account-eligibility';

const bank: Account = { id: 'acc-1', name: 'Checking', type: 'BANK' };
const wallet: Account = { id: 'acc-2', name: 'Wallet', type: 'DIGITAL_WALLET' };
const broker: Account = { id: 'acc-3', name: 'Broker', type: 'INVESTMENT' };
const coins: Account = { id: 'acc-4', name: 'Coins', type: 'CRYPTO' };
const loan: Account = { id: 'acc-5', name: 'Car loan', type: 'LOAN' };

describe('hasEligibleTarget', () => {
  it('treats any non-empty list as eligible when no category is given', () => {
    expect(hasEligibleTarget(null, [loan])).toBe(true);
    expect(hasEligibleTarget(undefined, [])).toBe(false);
  });

  it.each(['expense_account', 'income_account', 'auto_payment_source'] as const)(
    'requires a liquid account for %s',
    (category) => {
      expect(hasEligibleTarget(category, [broker, loan])).toBe(false);
      expect(hasEligibleTarget(category, [broker, wallet])).toBe(true);
    },
  );

  it('requires an investment, crypto or retirement account for investment_account', () => {
    expect(hasEligibleTarget('investment_account', [bank])).toBe(false);
    expect(hasEligibleTarget('investment_account', [bank, coins])).toBe(true);
  });

  it('accepts any account for other categories', () => {
    expect(hasEligibleTarget('credit_card', [loan])).toBe(true);
    expect(hasEligibleTarget('credit_card', [])).toBe(false);
  });
});

describe('eligibleAccounts', () => {
  const all = [bank, wallet, broker, coins, loan];

  it('filters liquid accounts for expense pickers', () => {
    expect(eligibleAccounts('expense_account', all)).toEqual([bank, wallet]);
  });

  it('filters investment accounts for investment pickers', () => {
    expect(eligibleAccounts('investment_account', all)).toEqual([broker, coins]);
  });

  it('returns everything for credit card pickers', () => {
    expect(eligibleAccounts('credit_card', all)).toEqual(all);
  });
});
