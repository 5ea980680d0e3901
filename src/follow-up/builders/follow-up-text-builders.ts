import { Logger } from '@nestjs/common';
import { NeedsMoreInfo } from '../follow-up.types';
import { FollowUpTextBuilder } from './follow-up-text-builder.interface';

import { HoldingFollowUpBuilder } from './handlers/holding.follow-up-builder';
import { AutoPaymentFollowUpBuilder } from './handlers/auto-payment.follow-up-builder';
import { TransactionFollowUpBuilder } from './handlers/transaction.follow-up-builder';
import { AssetFollowUpBuilder } from './handlers/asset.follow-up-builder';
import { CreditCardFollowUpBuilder } from './handlers/credit-card.follow-up-builder';
import { BudgetFollowUpBuilder } from './handlers/budget.follow-up-builder';

/**
 * Ordered registry of text follow-up builders.
 *
 * Builders are tried in registration order; the first one that handles the
 * pending intent and returns text wins. When none does, the user's reply is
 * passed to the interpreter unchanged.
 */
export class FollowUpTextBuilders {
  private readonly log = new Logger(FollowUpTextBuilders.name);
  private readonly builders: FollowUpTextBuilder[] = [
    new HoldingFollowUpBuilder(),
    new AutoPaymentFollowUpBuilder(),
    new TransactionFollowUpBuilder(),
    new AssetFollowUpBuilder(),
    new CreditCardFollowUpBuilder(),
    new BudgetFollowUpBuilder(),
  ];

  buildCombinedText(userInput: string, pending: NeedsMoreInfo): string {
    for (const builder of this.builders) {
      if (!builder.canHandle(pending.originalIntent)) continue;

      const text = builder.buildText(userInput, pending);
      if (text !== null) {
        this.log.debug(`[buildCombinedText] ${builder.name} -> "${text}"`);
        return text;
      }
    }

    this.log.debug(
      `[buildCombinedText] No builder for intent=${pending.originalIntent}, missing=${pending.missingFields.join(',')}`,
    );
    return userInput;
  }

  /**
   * Registers a custom builder ahead of the built-in ones.
   */
  register(builder: FollowUpTextBuilder): void {
    this.builders.unshift(builder);
    this.log.debug(`Registered builder: ${builder.name}`);
  }

  getBuilderNames(): string[] {
    return this.builders.map((b) => b.name);
  }
}
