/**
 * Date and amount proximity scoring.
 *
 * Both map linearly from the tolerance boundary (0) to an exact match (1).
 * Callers exclude candidates beyond the boundary before scoring.
 */

import Decimal from 'decimal.js';
import type { MatchingTolerances } from './types';

/**
 * Largest amount deviation still inside tolerance:
 * max(absolute, percent × |expected|).
 *
 * @example
 * // 1% of 15.99 is 0.1599, so the $1.00 floor wins
 * allowedAmountVariance(new Decimal('15.99'), DEFAULT_MATCHING_TOLERANCES) // 1
 */
export function allowedAmountVariance(
  expectedAmount: Decimal,
  tolerances: MatchingTolerances
): Decimal {
  return Decimal.max(
    tolerances.amountToleranceAbsolute,
    expectedAmount.abs().times(tolerances.amountTolerancePercent)
  );
}

/**
 * @example
 * calculateDateProximity(0, 3) // 1
 * calculateDateProximity(-1, 3) // 0.666…
 * calculateDateProximity(3, 3) // 0
 */
export function calculateDateProximity(dateOffsetDays: number, toleranceDays: number): number {
  const distance = Math.abs(dateOffsetDays);

  if (toleranceDays === 0) {
    return distance === 0 ? 1 : 0;
  }

  return Math.max(0, 1 - distance / toleranceDays);
}

/**
 * @example
 * calculateAmountProximity(new Decimal('0.50'), new Decimal('1')) // 0.5
 */
export function calculateAmountProximity(amountVariance: Decimal, allowedVariance: Decimal): number {
  if (allowedVariance.isZero()) {
    return amountVariance.isZero() ? 1 : 0;
  }

  return Math.max(0, 1 - amountVariance.abs().dividedBy(allowedVariance).toNumber());
}
