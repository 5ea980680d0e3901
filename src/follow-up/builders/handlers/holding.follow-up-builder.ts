import { EventKind, NeedsMoreInfo } from '../../follow-up.types';
import { FollowUpTextBuilder } from '../follow-up-text-builder.interface';
import { stripNoise } from '../builder-text';

const PRICE_NOISE = {
  cjk: ['美元', '港币', '元', '块'],
  words: ['USD', 'HKD', 'dollars', 'dollar', 'per share', '\\$'],
};

function currencyWord(currency: string): string {
  if (currency === 'USD') return 'dollars';
  if (currency === 'HKD') return 'HK dollars';
  return 'yuan';
}

/**
 * Holding trades missing a price per share.
 */
export class HoldingFollowUpBuilder implements FollowUpTextBuilder {
  readonly name = 'holding_update';

  canHandle(intent: EventKind): boolean {
    return intent === 'holding_update';
  }

  buildText(userInput: string, pending: NeedsMoreInfo): string | null {
    const partial = pending.partial;
    if (!partial || partial.kind !== 'holding_update') return null;
    const data = partial.data;

    if (!pending.missingFields.includes('price')) return null;

    const priceStr = stripNoise(userInput, PRICE_NOISE);
    const actionStr = data.action === 'sell' ? 'sell' : 'buy';

    return `${actionStr} ${Math.trunc(data.quantity)} shares of ${data.name}, ${priceStr} ${currencyWord(data.currency)} per share`;
  }
}
