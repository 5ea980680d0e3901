import { Injectable, Logger } from '@nestjs/common';
import {
  AUTO_PAYMENT_TYPES,
  AssetUpdatePayload,
  AutoPaymentPayload,
  BudgetPayload,
  CandidateEvent,
  CreditCardPayload,
  EVENT_KINDS,
  FollowUpSession,
  HOLDING_ACTIONS,
  HoldingPayload,
  NeedsMoreInfo,
  PARTIAL_KINDS,
  PICKER_CATEGORIES,
  PartialPayload,
  QueryResponsePayload,
  TRANSACTION_TYPES,
  TransactionPayload,
} from './follow-up.types';

export type EventValidationResult =
  | { valid: true; event: CandidateEvent }
  | { valid: false; error: string };

type Fields = Record<string, unknown>;
type Reader<T> = (data: Fields, field: string) => T;

const MAX_AMOUNT = 100_000_000;

class InvalidFieldError extends Error {}

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function present(data: Fields, field: string): unknown {
  const value = data[field];
  if (value === undefined || value === null) {
    throw new InvalidFieldError(`Missing required field: ${field}`);
  }
  return value;
}

function invalid(field: string): InvalidFieldError {
  return new InvalidFieldError(`Invalid value for field: ${field}`);
}

// ============ Field readers ============

const text: Reader<string> = (data, field) => {
  const value = present(data, field);
  if (typeof value !== 'string' || value.length >= 500) throw invalid(field);
  return value.trim();
};

const requiredText: Reader<string> = (data, field) => {
  const value = text(data, field);
  if (value.length === 0) throw invalid(field);
  return value;
};

const amount: Reader<number> = (data, field) => {
  const value = present(data, field);
  if (
    typeof value !== 'number' ||
    !Number.isFinite(value) ||
    value < 0 ||
    value >= MAX_AMOUNT
  ) {
    throw invalid(field);
  }
  return Math.round(value * 100) / 100;
};

const percentage: Reader<number> = (data, field) => {
  const value = present(data, field);
  if (typeof value !== 'number' || value < 0 || value > 100) {
    throw invalid(field);
  }
  return value;
};

const dayOfMonth: Reader<number> = (data, field) => {
  const value = present(data, field);
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 1 ||
    value > 31
  ) {
    throw invalid(field);
  }
  return value;
};

const currency: Reader<string> = (data, field) =>
  requiredText(data, field).toUpperCase();

const record: Reader<Fields> = (data, field) => {
  const value = present(data, field);
  if (!isRecord(value)) throw invalid(field);
  return value;
};

const list: Reader<unknown[]> = (data, field) => {
  const value = present(data, field);
  if (!Array.isArray(value)) throw invalid(field);
  return value;
};

const textList: Reader<string[]> = (data, field) =>
  list(data, field).map((item) => {
    if (typeof item !== 'string') throw invalid(field);
    return item.trim();
  });

function oneOf<T extends string>(values: readonly T[]): Reader<T> {
  return (data, field) => {
    const value = present(data, field);
    const match = values.find((v) => v === value);
    if (match === undefined) throw invalid(field);
    return match;
  };
}

/** undefined when absent, null when explicitly null */
function optional<T>(
  data: Fields,
  field: string,
  read: Reader<T>,
): T | null | undefined {
  const value = data[field];
  if (value === undefined || value === null) return value;
  return read(data, field);
}

// ============ Payload readers ============

function readTransaction(data: Fields): TransactionPayload {
  return {
    type: oneOf(TRANSACTION_TYPES)(data, 'type'),
    amount: amount(data, 'amount'),
    category: text(data, 'category').toLowerCase(),
    description: text(data, 'description'),
    accountName: optional(data, 'accountName', text) ?? '',
    cardIdentifier: optional(data, 'cardIdentifier', text),
    date: optional(data, 'date', requiredText) ?? undefined,
    currency: optional(data, 'currency', currency) ?? undefined,
  };
}

function readHolding(data: Fields): HoldingPayload {
  return {
    name: requiredText(data, 'name'),
    tickerCode: optional(data, 'tickerCode', text),
    action: oneOf(HOLDING_ACTIONS)(data, 'action'),
    quantity: amount(data, 'quantity'),
    price: optional(data, 'price', amount),
    currency: currency(data, 'currency'),
    accountName: optional(data, 'accountName', text),
    accountId: optional(data, 'accountId', text),
  };
}

function readAutoPayment(data: Fields): AutoPaymentPayload {
  return {
    name: requiredText(data, 'name'),
    paymentType: oneOf(AUTO_PAYMENT_TYPES)(data, 'paymentType'),
    amount: amount(data, 'amount'),
    dayOfMonth: optional(data, 'dayOfMonth', dayOfMonth),
    sourceAccount: optional(data, 'sourceAccount', text),
  };
}

function readAssetUpdate(data: Fields): AssetUpdatePayload {
  return {
    assetType: requiredText(data, 'assetType').toUpperCase(),
    assetName: requiredText(data, 'assetName'),
    totalValue: amount(data, 'totalValue'),
    currency: currency(data, 'currency'),
    institutionName: optional(data, 'institutionName', text),
    interestRate: optional(data, 'interestRate', percentage),
    repaymentDay: optional(data, 'repaymentDay', dayOfMonth),
    monthlyPayment: optional(data, 'monthlyPayment', amount),
  };
}

function readCreditCard(data: Fields): CreditCardPayload {
  return {
    name: requiredText(data, 'name'),
    creditLimit: optional(data, 'creditLimit', amount),
    repaymentDueDate: optional(data, 'repaymentDueDate', dayOfMonth),
    cardIdentifier: optional(data, 'cardIdentifier', text),
    currency: optional(data, 'currency', currency) ?? undefined,
  };
}

function readBudget(data: Fields): BudgetPayload {
  return {
    action: requiredText(data, 'action').toUpperCase(),
    name: requiredText(data, 'name'),
    targetAmount: amount(data, 'targetAmount'),
    category: optional(data, 'category', text),
    targetDate: optional(data, 'targetDate', requiredText),
  };
}

function readQueryResponse(data: Fields): QueryResponsePayload {
  return {
    queryType: requiredText(data, 'queryType'),
    summary: text(data, 'summary'),
  };
}

// ============ Partial payload readers ============
//
// A descriptor's payload lacks the fields it asks about. Absent fields take
// the zero value of their type; present ones are checked like a full event.

function orDefault<T>(data: Fields, field: string, read: Reader<T>, fallback: T): T {
  return optional(data, field, read) ?? fallback;
}

function readPartialTransaction(data: Fields): TransactionPayload {
  return {
    type: orDefault(data, 'type', oneOf(TRANSACTION_TYPES), 'expense'),
    amount: orDefault(data, 'amount', amount, 0),
    category: orDefault(data, 'category', text, '').toLowerCase(),
    description: orDefault(data, 'description', text, ''),
    accountName: orDefault(data, 'accountName', text, ''),
    cardIdentifier: optional(data, 'cardIdentifier', text),
    date: optional(data, 'date', requiredText) ?? undefined,
    currency: optional(data, 'currency', currency) ?? undefined,
  };
}

function readPartialHolding(data: Fields): HoldingPayload {
  return {
    name: orDefault(data, 'name', text, ''),
    tickerCode: optional(data, 'tickerCode', text),
    action: orDefault(data, 'action', oneOf(HOLDING_ACTIONS), 'buy'),
    quantity: orDefault(data, 'quantity', amount, 0),
    price: optional(data, 'price', amount),
    currency: orDefault(data, 'currency', text, '').toUpperCase(),
    accountName: optional(data, 'accountName', text),
    accountId: optional(data, 'accountId', text),
  };
}

function readPartialAutoPayment(data: Fields): AutoPaymentPayload {
  return {
    name: orDefault(data, 'name', text, ''),
    paymentType: orDefault(data, 'paymentType', oneOf(AUTO_PAYMENT_TYPES), 'other'),
    amount: orDefault(data, 'amount', amount, 0),
    dayOfMonth: optional(data, 'dayOfMonth', dayOfMonth),
    sourceAccount: optional(data, 'sourceAccount', text),
  };
}

function readPartialAssetUpdate(data: Fields): AssetUpdatePayload {
  return {
    assetType: orDefault(data, 'assetType', text, '').toUpperCase(),
    assetName: orDefault(data, 'assetName', text, ''),
    totalValue: orDefault(data, 'totalValue', amount, 0),
    currency: orDefault(data, 'currency', text, '').toUpperCase(),
    institutionName: optional(data, 'institutionName', text),
    interestRate: optional(data, 'interestRate', percentage),
    repaymentDay: optional(data, 'repaymentDay', dayOfMonth),
    monthlyPayment: optional(data, 'monthlyPayment', amount),
  };
}

function readPartialCreditCard(data: Fields): CreditCardPayload {
  return {
    name: orDefault(data, 'name', text, ''),
    creditLimit: optional(data, 'creditLimit', amount),
    repaymentDueDate: optional(data, 'repaymentDueDate', dayOfMonth),
    cardIdentifier: optional(data, 'cardIdentifier', text),
    currency: optional(data, 'currency', currency) ?? undefined,
  };
}

function readPartialBudget(data: Fields): BudgetPayload {
  return {
    action: orDefault(data, 'action', text, '').toUpperCase(),
    name: orDefault(data, 'name', text, ''),
    targetAmount: orDefault(data, 'targetAmount', amount, 0),
    category: optional(data, 'category', text),
    targetDate: optional(data, 'targetDate', requiredText),
  };
}

const readPartial: Reader<PartialPayload> = (parent, field) => {
  const raw = record(parent, field);
  const kind = oneOf(PARTIAL_KINDS)(raw, 'kind');
  const data = orDefault<Fields>(raw, 'data', record, {});

  switch (kind) {
    case 'transaction':
      return { kind, data: readPartialTransaction(data) };
    case 'asset_update':
      return { kind, data: readPartialAssetUpdate(data) };
    case 'credit_card_update':
      return { kind, data: readPartialCreditCard(data) };
    case 'holding_update':
      return { kind, data: readPartialHolding(data) };
    case 'budget':
      return { kind, data: readPartialBudget(data) };
    case 'auto_payment':
      return { kind, data: readPartialAutoPayment(data) };
  }
};

function readNeedsMoreInfo(data: Fields): NeedsMoreInfo {
  return {
    originalIntent: oneOf(EVENT_KINDS)(data, 'originalIntent'),
    missingFields: textList(data, 'missingFields'),
    question: requiredText(data, 'question'),
    pickerCategory: optional(data, 'pickerCategory', oneOf(PICKER_CATEGORIES)),
    partial: optional(data, 'partial', readPartial),
  };
}

function readEvent(raw: unknown): CandidateEvent {
  if (!isRecord(raw)) throw new InvalidFieldError('Event must be an object');

  const tag = present(raw, 'kind');
  const kind = EVENT_KINDS.find((k) => k === tag);
  if (kind === undefined) {
    throw new InvalidFieldError(`Unknown event kind: ${String(tag)}`);
  }
  if (kind === 'null_statement') return { kind };

  const data = record(raw, 'data');
  switch (kind) {
    case 'transaction':
      return { kind, data: readTransaction(data) };
    case 'asset_update':
      return { kind, data: readAssetUpdate(data) };
    case 'credit_card_update':
      return { kind, data: readCreditCard(data) };
    case 'holding_update':
      return { kind, data: readHolding(data) };
    case 'budget':
      return { kind, data: readBudget(data) };
    case 'auto_payment':
      return { kind, data: readAutoPayment(data) };
    case 'query_response':
      return { kind, data: readQueryResponse(data) };
    case 'need_more_info':
      return { kind, data: readNeedsMoreInfo(data) };
  }
}

function readEventList(data: Fields, field: string): CandidateEvent[] {
  return list(data, field).map(readEvent);
}

// ============ Public parsers ============

/**
 * Parses a candidate event from untrusted JSON. Strings are trimmed and
 * amounts rounded to cents; the first offending field is reported.
 */
export function parseCandidateEvent(raw: unknown): EventValidationResult {
  try {
    return { valid: true, event: readEvent(raw) };
  } catch (err) {
    if (err instanceof InvalidFieldError) {
      return { valid: false, error: err.message };
    }
    throw err;
  }
}

/**
 * Restores a session written by the session store from its stored parts.
 * Returns null when a part no longer matches the event model.
 */
export function parseFollowUpSession(
  ...parts: unknown[]
): FollowUpSession | null {
  const raw: Fields = {};
  for (const part of parts) {
    if (part === null || part === undefined) continue;
    if (!isRecord(part)) return null;
    Object.assign(raw, part);
  }

  try {
    return {
      pendingPartialData: isRecord(raw.pendingPartialData)
        ? readNeedsMoreInfo(raw.pendingPartialData)
        : null,
      pendingEvents: optional(raw, 'pendingEvents', readEventList) ?? [],
      pendingTransactionsForNewAccount:
        optional(raw, 'pendingTransactionsForNewAccount', readEventList) ?? [],
    };
  } catch (err) {
    if (err instanceof InvalidFieldError) return null;
    throw err;
  }
}

/**
 * Validates candidate events arriving from the interpreter or from a client
 * confirming a batch.
 */
@Injectable()
export class EventGuardrailsService {
  private readonly log = new Logger(EventGuardrailsService.name);

  validate(raw: unknown): EventValidationResult {
    const result = parseCandidateEvent(raw);
    if (!result.valid) {
      this.log.warn(`[validate] Rejected event: ${result.error}`);
    }
    return result;
  }

  /**
   * Keeps the valid events in order and reports why the others were dropped.
   */
  validateAll(raws: unknown[]): {
    events: CandidateEvent[];
    rejected: string[];
  } {
    const events: CandidateEvent[] = [];
    const rejected: string[] = [];

    raws.forEach((raw, index) => {
      const result = this.validate(raw);
      if (result.valid) {
        events.push(result.event);
      } else {
        rejected.push(`#${index}: ${result.error}`);
      }
    });

    return { events, rejected };
  }
}
