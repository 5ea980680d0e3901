import { EventKind, NeedsMoreInfo } from '../follow-up.types';

/**
 * Merges a user's free-text reply with a pending partial event into a single
 * statement the interpreter can parse again.
 *
 * Each builder is registered once in FollowUpTextBuilders and owns one
 * original intent. Builders are pure: same input, same output.
 */
export interface FollowUpTextBuilder {
  /**
   * Identifier used in logs.
   */
  readonly name: string;

  canHandle(intent: EventKind): boolean;

  /**
   * @returns The synthesized statement, or null when the missing field is not
   * one this builder knows, letting the registry fall back to the raw reply.
   */
  buildText(userInput: string, pending: NeedsMoreInfo): string | null;
}
