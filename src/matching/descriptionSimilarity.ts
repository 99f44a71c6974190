/**
 * Description Similarity for Reconciliation Matching
 *
 * Takes the best of three symmetric measures over normalized descriptions:
 * - token Dice coefficient (word overlap, order independent)
 * - containment ("CITY WATER" inside "CITY WATER DEPT")
 * - Levenshtein edit similarity (typos, truncation)
 */

import natural from 'natural';
import { normalizeDescription } from './normalizeDescription';
import { roundScore } from './confidenceCalculator';

function tokenDice(a: string, b: string): number {
  const left = new Set(a.split(' '));
  const right = new Set(b.split(' '));

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }

  return (2 * shared) / (left.size + right.size);
}

function containment(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  return longer.includes(shorter) ? shorter.length / longer.length : 0;
}

function editSimilarity(a: string, b: string): number {
  const distance = natural.LevenshteinDistance(a, b);
  return 1 - distance / Math.max(a.length, b.length);
}

/**
 * Similarity of two already-normalized descriptions, 0 to 1.
 */
export function compareNormalizedDescriptions(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  return roundScore(Math.max(tokenDice(a, b), containment(a, b), editSimilarity(a, b)));
}

/**
 * Case-insensitive, symmetric similarity of two raw descriptions.
 *
 * @example
 * calculateDescriptionSimilarity("NETFLIX.COM", "Netflix") // 1
 * calculateDescriptionSimilarity("ACH DEBIT CITY WATER", "City Water Dept") // 0.8
 * calculateDescriptionSimilarity("", "Netflix") // 0
 */
export function calculateDescriptionSimilarity(a: string, b: string): number {
  return compareNormalizedDescriptions(normalizeDescription(a), normalizeDescription(b));
}

export default calculateDescriptionSimilarity;
