import {
  AutoPaymentType,
  EventKind,
  NeedsMoreInfo,
} from '../../follow-up.types';
import { FollowUpTextBuilder } from '../follow-up-text-builder.interface';
import { stripNoise } from '../builder-text';

const DAY_NOISE = {
  cjk: ['每个月', '每月', '号', '日'],
  words: [
    'of each month',
    'of every month',
    'of the month',
    'per month',
    'every month',
    'each month',
    'a month',
    'monthly',
    'on',
    'the',
    'day',
  ],
  ordinals: true,
};

const PAYMENT_TYPE_WORDS: Record<AutoPaymentType, string> = {
  subscription: 'subscription',
  membership: 'membership',
  insurance: 'insurance',
  utility: 'utility bill',
  rent: 'rent',
  loan: 'auto-payment',
  other: 'auto-payment',
};

/**
 * Auto-payments only ever come back asking for the charge day, so the
 * missing field is not inspected.
 */
export class AutoPaymentFollowUpBuilder implements FollowUpTextBuilder {
  readonly name = 'auto_payment';

  canHandle(intent: EventKind): boolean {
    return intent === 'auto_payment';
  }

  buildText(userInput: string, pending: NeedsMoreInfo): string | null {
    const partial = pending.partial;
    if (!partial || partial.kind !== 'auto_payment') return null;
    const data = partial.data;

    const dayStr = stripNoise(userInput, DAY_NOISE);
    const typeStr = PAYMENT_TYPE_WORDS[data.paymentType];

    return `${typeStr} ${data.name} ${data.amount}块 per month, charged on day ${dayStr} of each month`;
  }
}
