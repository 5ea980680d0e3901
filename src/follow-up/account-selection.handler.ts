import {
  CandidateEvent,
  HoldingPayload,
  NeedsMoreInfo,
  PickerCategory,
  Resolution,
  SelectedAccountInfo,
  TransactionPayload,
  isHoldingResolved,
  isTransactionResolved,
} from './follow-up.types';

/**
 * AccountSelectionHandler - resolves events that are complete except for the
 * account they belong to.
 *
 * - Detects the first missing-account condition in a batch
 * - Fans a chosen account out over every matching event
 * - Rebuilds a single event from a stashed partial payload
 *
 * Never throws: a descriptor whose payload is missing or of the wrong kind
 * yields null.
 */
export class AccountSelectionHandler {
  /**
   * Synthesizes a picker descriptor for the first unresolved transaction or
   * holding. Only that first event decides the picker category.
   */
  checkNeedAccountSelection(events: CandidateEvent[]): NeedsMoreInfo | null {
    for (const event of events) {
      if (event.kind === 'transaction' && !isTransactionResolved(event.data)) {
        const isIncome = event.data.type === 'income';
        return {
          originalIntent: 'transaction',
          missingFields: ['source_account'],
          question: isIncome
            ? 'Please select the receiving account'
            : 'Please select the payment account',
          pickerCategory: isIncome ? 'income_account' : 'expense_account',
          partial: { kind: 'transaction', data: event.data },
        };
      }

      if (event.kind === 'holding_update' && !isHoldingResolved(event.data)) {
        return {
          originalIntent: 'holding_update',
          missingFields: ['account'],
          question: 'Please select the investment account',
          pickerCategory: 'investment_account',
          partial: { kind: 'holding_update', data: event.data },
        };
      }
    }

    return null;
  }

  /**
   * Applies one chosen account to every unresolved event it can serve.
   * Transactions always take it; holdings only when the pick came from an
   * investment picker. Untouched events keep their identity.
   */
  applyAccountToMultipleEvents(
    events: CandidateEvent[],
    selected: SelectedAccountInfo,
    pickerCategory?: PickerCategory | null,
  ): Resolution {
    const fillHoldings =
      pickerCategory === 'investment_account' && selected.type === 'account';

    const updated = events.map((event): CandidateEvent => {
      if (event.kind === 'transaction' && !isTransactionResolved(event.data)) {
        return { kind: 'transaction', data: withAccount(event.data, selected) };
      }
      if (
        fillHoldings &&
        event.kind === 'holding_update' &&
        !isHoldingResolved(event.data)
      ) {
        return {
          kind: 'holding_update',
          data: withHoldingAccount(event.data, selected),
        };
      }
      return event;
    });

    return {
      events: updated,
      confirmText: `OK, ${updated.length} records will use ${selected.displayName}`,
    };
  }

  /**
   * Rebuilds the single event a descriptor was stashed for.
   */
  createEventFromPartialData(
    needsMoreInfo: NeedsMoreInfo,
    selected: SelectedAccountInfo,
  ): Resolution | null {
    const partial = needsMoreInfo.partial;
    if (!partial || partial.kind !== needsMoreInfo.originalIntent) return null;

    switch (partial.kind) {
      case 'transaction': {
        const data = withAccount(partial.data, selected);
        return {
          events: [{ kind: 'transaction', data }],
          confirmText: buildSelectionConfirmText(data, selected.displayName),
        };
      }

      case 'holding_update': {
        const data = withHoldingAccount(partial.data, selected);
        const actionStr = data.action === 'sell' ? 'sell' : 'buy';
        return {
          events: [{ kind: 'holding_update', data }],
          confirmText: `OK, ${actionStr} ${Math.trunc(data.quantity)} shares of ${data.name} using the ${selected.displayName} account`,
        };
      }

      case 'auto_payment': {
        const data = { ...partial.data, sourceAccount: selected.displayName };
        return {
          events: [{ kind: 'auto_payment', data }],
          confirmText: `OK, the auto-payment for ${data.name} will be paid from ${selected.displayName}`,
        };
      }

      default:
        return null;
    }
  }
}

function withAccount(
  data: TransactionPayload,
  selected: SelectedAccountInfo,
): TransactionPayload {
  if (selected.type === 'credit_card') {
    return { ...data, cardIdentifier: selected.cardIdentifier ?? null };
  }
  return { ...data, accountName: selected.displayName };
}

function withHoldingAccount(
  data: HoldingPayload,
  selected: SelectedAccountInfo,
): HoldingPayload {
  return { ...data, accountName: selected.displayName, accountId: selected.id };
}

function buildSelectionConfirmText(
  data: TransactionPayload,
  accountName: string,
): string {
  const amountStr = data.amount.toFixed(0);

  if (data.type === 'income') {
    return `OK, ${data.description} income ${amountStr}, stored into ${accountName}`;
  }
  return `OK, ${data.description} expense ${amountStr}, paid via ${accountName}`;
}
