/**
 * Description Normalization for Reconciliation Matching
 *
 * Bank descriptions wrap the merchant name in processor noise:
 * "POS PURCHASE NETFLIX.COM 8665797172" vs "Netflix".
 *
 * Normalization steps:
 * 1. Convert to uppercase
 * 2. Replace every run of non-alphanumeric characters with a space
 * 3. Drop noise words (COM, POS, PURCHASE, DEBIT, ...)
 * 4. Collapse to single spaces
 */

import { NOISE_WORDS } from './constants';

const NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/gu;

/**
 * Splits a description into its meaningful upper-case tokens.
 *
 * @example
 * tokenizeDescription("ACH DEBIT - City Water") // ["CITY", "WATER"]
 */
export function tokenizeDescription(description: string): string[] {
  if (!description) {
    return [];
  }

  return description
    .toUpperCase()
    .replace(NON_ALPHANUMERIC, ' ')
    .split(' ')
    .filter((token) => token.length > 0 && !NOISE_WORDS.has(token));
}

/**
 * @example
 * normalizeDescription("NETFLIX.COM") // "NETFLIX"
 * normalizeDescription("POS Purchase  Spotify AB") // "SPOTIFY AB"
 * normalizeDescription("") // ""
 */
export function normalizeDescription(description: string): string {
  return tokenizeDescription(description).join(' ');
}

export default normalizeDescription;
