import { Account, assetTypeIcon, isInvestmentAccount } from './accounts';
import { hasEligibleTarget } from './account-eligibility';
import { AccountSelectionHandler } from './account-selection.handler';
import { FollowUpTextBuilders } from './builders/follow-up-text-builders';
import {
  CandidateEvent,
  FollowUpSession,
  NeedsMoreInfo,
  PickerCategory,
  Resolution,
  SelectedAccountInfo,
} from './follow-up.types';

/**
 * What the presentation layer should do with an interpreter batch.
 */
export type FollowUpResult =
  | { type: 'show_text_follow_up'; question: string }
  | { type: 'show_picker_follow_up'; needsMoreInfo: NeedsMoreInfo }
  | { type: 'show_event_cards'; events: CandidateEvent[] }
  | { type: 'no_follow_up_needed' }
  | { type: 'no_accounts_guidance'; message: string; events: CandidateEvent[] };

const LIQUID_GUIDANCE =
  'You don\'t have an asset account to link this to yet. I can add one for you, just tell me something like: "My Citibank savings card has 4000$"';

const INVESTMENT_GUIDANCE =
  'You don\'t have an investment account to link this to yet. I can add a brokerage or crypto account for you, just tell me something like: "I have 100000 in my brokerage account"';

/**
 * Follow-up state machine.
 *
 * Idle -> AwaitingText | AwaitingPicker | AwaitingNewAccount -> Idle
 *
 * Every operation takes the current session and returns the next one next to
 * its result; the session passed in is left untouched. Callers serialize
 * turns per user.
 */
export class FollowUpManager {
  constructor(
    private readonly textBuilders = new FollowUpTextBuilders(),
    private readonly accountHandler = new AccountSelectionHandler(),
  ) {}

  processParseResult(
    session: FollowUpSession,
    events: CandidateEvent[],
    availableAccounts: Account[],
  ): { session: FollowUpSession; result: FollowUpResult } {
    // 1. Interpreter asked for more info itself
    const explicit = events.find((e) => e.kind === 'need_more_info');
    if (explicit && explicit.kind === 'need_more_info') {
      const needsMoreInfo = explicit.data;
      const next: FollowUpSession = {
        ...session,
        pendingPartialData: needsMoreInfo,
        pendingEvents: [],
      };

      if (!needsMoreInfo.pickerCategory) {
        return {
          session: next,
          result: { type: 'show_text_follow_up', question: needsMoreInfo.question },
        };
      }

      if (!hasEligibleTarget(needsMoreInfo.pickerCategory, availableAccounts)) {
        // The interpreter's question already carries guidance
        return {
          session: next,
          result: {
            type: 'no_accounts_guidance',
            message: needsMoreInfo.question,
            events,
          },
        };
      }

      return {
        session: next,
        result: { type: 'show_picker_follow_up', needsMoreInfo },
      };
    }

    // 2. Complete events that still lack an account
    const accountFollowUp = this.accountHandler.checkNeedAccountSelection(events);
    if (accountFollowUp) {
      if (!hasEligibleTarget(accountFollowUp.pickerCategory, availableAccounts)) {
        return {
          session: { ...session, pendingTransactionsForNewAccount: events },
          result: {
            type: 'no_accounts_guidance',
            message: buildNoAccountGuidanceMessage(accountFollowUp.pickerCategory),
            events,
          },
        };
      }

      return {
        session: {
          ...session,
          pendingPartialData: accountFollowUp,
          pendingEvents: events,
        },
        result: { type: 'show_picker_follow_up', needsMoreInfo: accountFollowUp },
      };
    }

    // 3. Nothing blocks persistence
    return { session, result: { type: 'show_event_cards', events } };
  }

  /**
   * Fuses a text reply with the pending descriptor. The descriptor is consumed
   * whether or not a builder matched.
   */
  buildCombinedTextForFollowUp(
    session: FollowUpSession,
    userInput: string,
  ): { session: FollowUpSession; text: string | null } {
    const pending = session.pendingPartialData;
    if (!pending) return { session, text: null };

    return {
      session: { ...session, pendingPartialData: null },
      text: this.textBuilders.buildCombinedText(userInput, pending),
    };
  }

  handlePickerSelection(
    session: FollowUpSession,
    selected: SelectedAccountInfo,
    needsMoreInfo: NeedsMoreInfo,
  ): { session: FollowUpSession; resolution: Resolution | null } {
    const cleared: FollowUpSession = { ...session, pendingPartialData: null };

    if (session.pendingEvents.length > 0) {
      return {
        session: { ...cleared, pendingEvents: [] },
        resolution: this.accountHandler.applyAccountToMultipleEvents(
          session.pendingEvents,
          selected,
          needsMoreInfo.pickerCategory,
        ),
      };
    }

    return {
      session: cleared,
      resolution: this.accountHandler.createEventFromPartialData(
        needsMoreInfo,
        selected,
      ),
    };
  }

  /**
   * Links the batch stashed while no eligible account existed to the account
   * the user has just created.
   */
  applyPendingTransactionsToNewAccount(
    session: FollowUpSession,
    newAccount: Account,
  ): { session: FollowUpSession; resolution: Resolution | null } {
    const stashed = session.pendingTransactionsForNewAccount;
    if (stashed.length === 0) return { session, resolution: null };

    const selected: SelectedAccountInfo = {
      id: newAccount.id,
      displayName: newAccount.name,
      type: 'account',
      icon: assetTypeIcon(newAccount.type),
      cardIdentifier: null,
    };
    const category: PickerCategory = isInvestmentAccount(newAccount)
      ? 'investment_account'
      : 'expense_account';

    const { events } = this.accountHandler.applyAccountToMultipleEvents(
      stashed,
      selected,
      category,
    );

    return {
      session: { ...session, pendingTransactionsForNewAccount: [] },
      resolution: {
        events,
        confirmText: `Account added! ${events.length} earlier records are now linked to "${newAccount.name}"`,
      },
    };
  }

  /**
   * Drops the current turn's follow-up. The new-account stash survives.
   */
  cancelFollowUp(session: FollowUpSession): FollowUpSession {
    return { ...session, pendingPartialData: null, pendingEvents: [] };
  }

  clearPendingTransactionsForNewAccount(
    session: FollowUpSession,
  ): FollowUpSession {
    return { ...session, pendingTransactionsForNewAccount: [] };
  }

  /**
   * The picker a batch would still need, or null when every event can be
   * stored as is.
   */
  findUnresolvedAccount(events: CandidateEvent[]): NeedsMoreInfo | null {
    return this.accountHandler.checkNeedAccountSelection(events);
  }

  hasPendingFollowUp(session: FollowUpSession): boolean {
    return session.pendingPartialData !== null;
  }

  hasPendingTransactionsForNewAccount(session: FollowUpSession): boolean {
    return session.pendingTransactionsForNewAccount.length > 0;
  }
}

function buildNoAccountGuidanceMessage(
  pickerCategory: PickerCategory | null | undefined,
): string {
  return pickerCategory === 'investment_account'
    ? INVESTMENT_GUIDANCE
    : LIQUID_GUIDANCE;
}
