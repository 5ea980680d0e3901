import { EventKind, NeedsMoreInfo } from '../../follow-up.types';
import { FollowUpTextBuilder } from '../follow-up-text-builder.interface';
import { AMOUNT_NOISE, stripNoise, transactionWord } from '../builder-text';

/**
 * Transaction follow-ups: the interpreter knew what was bought but not how
 * much, or how much but not the category.
 */
export class TransactionFollowUpBuilder implements FollowUpTextBuilder {
  readonly name = 'transaction';

  canHandle(intent: EventKind): boolean {
    return intent === 'transaction';
  }

  buildText(userInput: string, pending: NeedsMoreInfo): string | null {
    const partial = pending.partial;
    if (!partial || partial.kind !== 'transaction') return null;
    const data = partial.data;

    const typeStr = transactionWord(data.type);

    if (pending.missingFields.includes('amount')) {
      const amountStr = stripNoise(userInput, AMOUNT_NOISE);
      return `${data.description} ${typeStr} ${amountStr}块`;
    }

    if (pending.missingFields.includes('category')) {
      return `${data.description} ${typeStr} ${data.amount}, category is ${userInput.trim()}`;
    }

    return null;
  }
}
