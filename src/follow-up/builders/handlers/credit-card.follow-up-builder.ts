import { EventKind, NeedsMoreInfo } from '../../follow-up.types';
import { FollowUpTextBuilder } from '../follow-up-text-builder.interface';
import { AMOUNT_NOISE, expandTenThousands, stripNoise } from '../builder-text';

const DUE_DAY_NOISE = {
  cjk: ['号', '日'],
  words: ['of the month', 'on', 'the', 'day'],
  ordinals: true,
};

export class CreditCardFollowUpBuilder implements FollowUpTextBuilder {
  readonly name = 'credit_card_update';

  canHandle(intent: EventKind): boolean {
    return intent === 'credit_card_update';
  }

  buildText(userInput: string, pending: NeedsMoreInfo): string | null {
    const partial = pending.partial;
    if (!partial || partial.kind !== 'credit_card_update') return null;
    const data = partial.data;

    if (pending.missingFields.includes('credit_limit')) {
      const limitStr = expandTenThousands(stripNoise(userInput, AMOUNT_NOISE));
      return `${data.name} credit card limit ${limitStr}`;
    }

    if (pending.missingFields.includes('repayment_due_date')) {
      const dayStr = stripNoise(userInput, DUE_DAY_NOISE);
      return `${data.name} credit card limit ${data.creditLimit ?? 0}, repayment day ${dayStr}`;
    }

    return null;
  }
}
