import { Account, isInvestmentAccount, isLiquidAccount } from './accounts';
import { PickerCategory } from './follow-up.types';

/**
 * Whether any account in the snapshot can serve the given picker.
 * Callers pass a fresh snapshot every time; nothing is cached here.
 */
export function hasEligibleTarget(
  pickerCategory: PickerCategory | null | undefined,
  availableAccounts: Account[],
): boolean {
  if (!pickerCategory) return availableAccounts.length > 0;

  switch (pickerCategory) {
    case 'expense_account':
    case 'income_account':
    case 'auto_payment_source':
      return availableAccounts.some(isLiquidAccount);
    case 'investment_account':
      return availableAccounts.some(isInvestmentAccount);
    default:
      return availableAccounts.length > 0;
  }
}

/**
 * Accounts a picker of the given category should list.
 */
export function eligibleAccounts(
  pickerCategory: PickerCategory | null | undefined,
  availableAccounts: Account[],
): Account[] {
  switch (pickerCategory) {
    case 'expense_account':
    case 'income_account':
    case 'auto_payment_source':
      return availableAccounts.filter(isLiquidAccount);
    case 'investment_account':
      return availableAccounts.filter(isInvestmentAccount);
    default:
      return availableAccounts;
  }
}
