import { EventKind, NeedsMoreInfo } from '../../follow-up.types';
import { FollowUpTextBuilder } from '../follow-up-text-builder.interface';
import {
  AMOUNT_NOISE,
  expandTenThousands,
  hasMissing,
  stripNoise,
} from '../builder-text';

export class AssetFollowUpBuilder implements FollowUpTextBuilder {
  readonly name = 'asset_update';

  canHandle(intent: EventKind): boolean {
    return intent === 'asset_update';
  }

  buildText(userInput: string, pending: NeedsMoreInfo): string | null {
    const partial = pending.partial;
    if (!partial || partial.kind !== 'asset_update') return null;
    const data = partial.data;
    const missing = pending.missingFields;

    if (hasMissing(missing, 'amount', 'total_value')) {
      const amountStr = expandTenThousands(stripNoise(userInput, AMOUNT_NOISE));
      return `I have ${amountStr} in ${data.assetName}`;
    }

    if (hasMissing(missing, 'interest_rate')) {
      return `${data.assetName} ${data.totalValue}块, interest rate ${userInput.trim()}`;
    }

    // Loans and mortgages
    if (hasMissing(missing, 'repayment_day', 'monthly_payment')) {
      return `${data.assetName} ${data.totalValue}块, ${userInput.trim()}`;
    }

    return null;
  }
}
