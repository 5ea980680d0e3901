export type EventKind =
  | 'transaction'
  | 'asset_update'
  | 'credit_card_update'
  | 'holding_update'
  | 'budget'
  | 'auto_payment'
  | 'query_response'
  | 'null_statement'
  | 'need_more_info';

export type TransactionType = 'income' | 'expense' | 'transfer';

export type HoldingAction = 'buy' | 'sell' | 'hold';

export type AutoPaymentType =
  | 'subscription'
  | 'membership'
  | 'insurance'
  | 'utility'
  | 'rent'
  | 'loan'
  | 'other';

/** Which class of target a structured chooser must offer */
export type PickerCategory =
  | 'expense_account'
  | 'income_account'
  | 'investment_account'
  | 'credit_card'
  | 'auto_payment_source';

export const EVENT_KINDS: readonly EventKind[] = [
  'transaction',
  'asset_update',
  'credit_card_update',
  'holding_update',
  'budget',
  'auto_payment',
  'query_response',
  'null_statement',
  'need_more_info',
];

export const TRANSACTION_TYPES: readonly TransactionType[] = [
  'income',
  'expense',
  'transfer',
];

export const HOLDING_ACTIONS: readonly HoldingAction[] = ['buy', 'sell', 'hold'];

export const AUTO_PAYMENT_TYPES: readonly AutoPaymentType[] = [
  'subscription',
  'membership',
  'insurance',
  'utility',
  'rent',
  'loan',
  'other',
];

export const PICKER_CATEGORIES: readonly PickerCategory[] = [
  'expense_account',
  'income_account',
  'investment_account',
  'credit_card',
  'auto_payment_source',
];

// ============ Payloads ============

export interface TransactionPayload {
  type: TransactionType;
  amount: number;
  category: string;
  description: string;
  accountName: string; // empty until resolved
  cardIdentifier?: string | null;
  date?: string; // ISO-8601
  currency?: string;
}

export interface HoldingPayload {
  name: string;
  tickerCode?: string | null;
  action: HoldingAction;
  quantity: number;
  price?: number | null;
  currency: string;
  accountName?: string | null;
  accountId?: string | null;
}

export interface AutoPaymentPayload {
  name: string;
  paymentType: AutoPaymentType;
  amount: number;
  dayOfMonth?: number | null;
  sourceAccount?: string | null;
}

export interface AssetUpdatePayload {
  assetType: string;
  assetName: string;
  totalValue: number;
  currency: string;
  institutionName?: string | null;
  interestRate?: number | null;
  repaymentDay?: number | null;
  monthlyPayment?: number | null;
}

export interface CreditCardPayload {
  name: string;
  creditLimit?: number | null;
  repaymentDueDate?: number | null;
  cardIdentifier?: string | null;
  currency?: string;
}

export interface BudgetPayload {
  action: string; // CREATE_SAVINGS, CREATE_DEBT_REPAYMENT, UPDATE_TARGET
  name: string;
  targetAmount: number;
  category?: string | null;
  targetDate?: string | null; // YYYY-MM
}

export interface QueryResponsePayload {
  queryType: string;
  summary: string;
}

// ============ Needs-more-info descriptor ============

/**
 * The partially filled payload a descriptor carries.
 * Tagged so a payload can never sit under the wrong kind.
 */
export type PartialPayload =
  | { kind: 'transaction'; data: TransactionPayload }
  | { kind: 'asset_update'; data: AssetUpdatePayload }
  | { kind: 'credit_card_update'; data: CreditCardPayload }
  | { kind: 'holding_update'; data: HoldingPayload }
  | { kind: 'budget'; data: BudgetPayload }
  | { kind: 'auto_payment'; data: AutoPaymentPayload };

export type PartialKind = PartialPayload['kind'];

export const PARTIAL_KINDS: readonly PartialKind[] = [
  'transaction',
  'asset_update',
  'credit_card_update',
  'holding_update',
  'budget',
  'auto_payment',
];

/**
 * Produced by the interpreter when it cannot complete a single event,
 * or synthesized locally when an otherwise complete event lacks an account.
 * Consumed exactly once, then discarded.
 */
export interface NeedsMoreInfo {
  originalIntent: EventKind;
  missingFields: string[];
  question: string;
  pickerCategory?: PickerCategory | null;
  partial?: PartialPayload | null;
}

// ============ Candidate events ============

export type CandidateEvent =
  | { kind: 'transaction'; data: TransactionPayload }
  | { kind: 'asset_update'; data: AssetUpdatePayload }
  | { kind: 'credit_card_update'; data: CreditCardPayload }
  | { kind: 'holding_update'; data: HoldingPayload }
  | { kind: 'budget'; data: BudgetPayload }
  | { kind: 'auto_payment'; data: AutoPaymentPayload }
  | { kind: 'query_response'; data: QueryResponsePayload }
  | { kind: 'null_statement' }
  | { kind: 'need_more_info'; data: NeedsMoreInfo };

// ============ Picker selection ============

export type SelectedAccountType = 'account' | 'credit_card';

export interface SelectedAccountInfo {
  id: string;
  displayName: string;
  type: SelectedAccountType;
  icon: string;
  cardIdentifier?: string | null; // required when type is credit_card
}

/** A finished batch and the sentence confirming it */
export interface Resolution {
  events: CandidateEvent[];
  confirmText: string;
}

// ============ Session ============

/**
 * Follow-up state held across turns for one user.
 * Engine operations never mutate it; they return an updated copy.
 */
export interface FollowUpSession {
  pendingPartialData: NeedsMoreInfo | null;
  pendingEvents: CandidateEvent[];
  pendingTransactionsForNewAccount: CandidateEvent[];
}

export function emptySession(): FollowUpSession {
  return {
    pendingPartialData: null,
    pendingEvents: [],
    pendingTransactionsForNewAccount: [],
  };
}

// ============ Account-resolved predicates ============

export function isTransactionResolved(data: TransactionPayload): boolean {
  return data.accountName.length > 0 || !!data.cardIdentifier;
}

/** Resolved by account id only */
export function isHoldingResolved(data: HoldingPayload): boolean {
  return !!data.accountId;
}

export function isAutoPaymentResolved(data: AutoPaymentPayload): boolean {
  return !!data.sourceAccount;
}
