/**
 * Transaction Matcher
 *
 * Scores one imported transaction against every supplied scheduled
 * instance and returns the survivors, best first.
 *
 * Flow, per instance:
 * 1. Currency must agree
 * 2. |dateOffsetDays| ≤ dateToleranceDays
 * 3. |amountVariance| ≤ max(absolute, percent × |expected|)
 * 4. Description similarity ≥ threshold, unless date and amount are both exact
 * 5. Blend into a confidence score
 *
 * Restricting the candidate set to a sensible window is the caller's job.
 */

import { diffInDays } from '../utils/dateOnly';
import type { RecurringScheduleInstance } from '../recurrence/types';
import { normalizeDescription } from './normalizeDescription';
import { compareNormalizedDescriptions } from './descriptionSimilarity';
import {
  allowedAmountVariance,
  calculateAmountProximity,
  calculateDateProximity,
} from './proximity';
import {
  calculateConfidence,
  determineConfidenceLevel,
  generateExplanation,
} from './confidenceCalculator';
import { DEFAULT_MATCHING_TOLERANCES, DEFAULT_SCORING_WEIGHTS } from './tolerances';
import type {
  ConfidenceBreakdown,
  ImportedTransactionInput,
  MatchCandidate,
  MatchingTolerances,
  ScoringWeights,
} from './types';

/**
 * Scores a single instance against the transaction.
 *
 * @param normalizedDescription - Normalized transaction description, computed once per transaction
 * @returns The candidate, or null when a tolerance excludes it
 */
function scoreInstance(
  transaction: ImportedTransactionInput,
  normalizedDescription: string,
  instance: RecurringScheduleInstance,
  tolerances: MatchingTolerances,
  weights: ScoringWeights
): MatchCandidate | null {
  if (instance.isSkipped) {
    return null;
  }

  if (instance.currency.toUpperCase() !== transaction.currency.toUpperCase()) {
    return null;
  }

  const dateOffsetDays = diffInDays(transaction.date, instance.instanceDate);
  if (Math.abs(dateOffsetDays) > tolerances.dateToleranceDays) {
    return null;
  }

  const amountVariance = instance.expectedAmount.minus(transaction.amount);
  const allowedVariance = allowedAmountVariance(instance.expectedAmount, tolerances);
  if (amountVariance.abs().greaterThan(allowedVariance)) {
    return null;
  }

  const descriptionSimilarity = compareNormalizedDescriptions(
    normalizedDescription,
    normalizeDescription(instance.description)
  );
  const isExact = dateOffsetDays === 0 && amountVariance.isZero();
  if (!isExact && descriptionSimilarity < tolerances.descriptionSimilarityThreshold) {
    return null;
  }

  const breakdown: ConfidenceBreakdown = {
    dateProximity: calculateDateProximity(dateOffsetDays, tolerances.dateToleranceDays),
    amountProximity: calculateAmountProximity(amountVariance, allowedVariance),
    descriptionSimilarity,
  };
  const confidenceScore = calculateConfidence(breakdown, weights);
  const confidenceLevel = determineConfidenceLevel(confidenceScore);

  return {
    recurringTransactionId: instance.recurringTransactionId,
    instanceDate: instance.instanceDate,
    expectedAmount: instance.expectedAmount,
    confidenceScore,
    confidenceLevel,
    amountVariance,
    dateOffsetDays,
    descriptionSimilarity,
    breakdown,
    explanation: generateExplanation({
      dateOffsetDays,
      amountVariance,
      breakdown,
      confidenceScore,
      confidenceLevel,
    }),
  };
}

/**
 * Best first: higher score, then smaller |offset|, then smaller |variance|.
 * Instance identity settles any remaining tie so the order is total.
 */
function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  return (
    b.confidenceScore - a.confidenceScore ||
    Math.abs(a.dateOffsetDays) - Math.abs(b.dateOffsetDays) ||
    a.amountVariance.abs().comparedTo(b.amountVariance.abs()) ||
    compareStrings(a.recurringTransactionId, b.recurringTransactionId) ||
    compareStrings(a.instanceDate, b.instanceDate)
  );
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Matches one imported transaction against candidate instances.
 *
 * This function is pure and deterministic - given the same inputs,
 * it will always return the same output.
 *
 * @example
 * const candidates = findMatches(
 *   { id: 't1', date: '2026-01-16', amount: new Decimal('15.99'), currency: 'USD', description: 'NETFLIX.COM' },
 *   [{ recurringTransactionId: 'r1', instanceDate: '2026-01-15', expectedAmount: new Decimal('15.99'),
 *      currency: 'USD', description: 'Netflix', isSkipped: false, isModified: false }]
 * );
 * // [{ dateOffsetDays: 1, amountVariance: 0, confidenceScore: 0.9167, confidenceLevel: 'high', ... }]
 */
export function findMatches(
  transaction: ImportedTransactionInput,
  instances: readonly RecurringScheduleInstance[],
  tolerances: MatchingTolerances = DEFAULT_MATCHING_TOLERANCES,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): MatchCandidate[] {
  const normalizedDescription = normalizeDescription(transaction.description);
  const candidates: MatchCandidate[] = [];

  for (const instance of instances) {
    const candidate = scoreInstance(
      transaction,
      normalizedDescription,
      instance,
      tolerances,
      weights
    );
    if (candidate) {
      candidates.push(candidate);
    }
  }

  return candidates.sort(compareCandidates);
}

export default findMatches;
