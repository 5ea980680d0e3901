import { EventKind, NeedsMoreInfo } from '../../follow-up.types';
import { FollowUpTextBuilder } from '../follow-up-text-builder.interface';
import { AMOUNT_NOISE, hasMissing, stripNoise } from '../builder-text';

export class BudgetFollowUpBuilder implements FollowUpTextBuilder {
  readonly name = 'budget';

  canHandle(intent: EventKind): boolean {
    return intent === 'budget';
  }

  buildText(userInput: string, pending: NeedsMoreInfo): string | null {
    const partial = pending.partial;
    if (!partial || partial.kind !== 'budget') return null;
    const data = partial.data;

    if (hasMissing(pending.missingFields, 'amount', 'target_amount')) {
      const amountStr = stripNoise(userInput, AMOUNT_NOISE);
      return `${data.name} budget ${amountStr}块`;
    }

    if (pending.missingFields.includes('category')) {
      return `${userInput.trim()} budget ${data.targetAmount}块`;
    }

    return null;
  }
}
