import { TransactionType } from '../follow-up.types';

export const AMOUNT_NOISE = {
  cjk: ['元', '块'],
  words: ['yuan', 'dollars', 'dollar', '\\$'],
};

function escapeRegex(token: string): string {
  return token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Removes currency words, day suffixes and similar noise from a reply.
 * `cjk` tokens are removed wherever they appear; `words` only when not part of
 * a longer latin word, so "15yuan" loses its unit but "dayton" keeps "day".
 * An entry starting with a backslash is a raw pattern.
 */
export function stripNoise(
  input: string,
  noise: { cjk?: string[]; words?: string[]; ordinals?: boolean },
): string {
  let out = input;

  for (const token of noise.cjk ?? []) {
    out = out.split(token).join('');
  }

  for (const word of noise.words ?? []) {
    const pattern = word.startsWith('\\')
      ? new RegExp(word, 'g')
      : new RegExp(`(?<![a-z])${escapeRegex(word)}(?![a-z])`, 'gi');
    out = out.replace(pattern, ' ');
  }

  if (noise.ordinals) {
    out = out.replace(/(\d+)(st|nd|rd|th)\b/gi, '$1');
  }

  return out.replace(/\s+/g, ' ').trim();
}

/** "万" (ten thousand) written out as digits */
export function expandTenThousands(input: string): string {
  return input.split('万').join('0000');
}

export function transactionWord(type: TransactionType): string {
  switch (type) {
    case 'income':
      return 'income';
    case 'transfer':
      return 'transfer';
    default:
      return 'expense';
  }
}

export function hasMissing(missingFields: string[], ...fields: string[]): boolean {
  return fields.some((f) => missingFields.includes(f));
}
