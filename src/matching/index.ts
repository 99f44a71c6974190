/**
 * Reconciliation Matching Engine
 *
 * Pure, deterministic functions for matching imported transactions to
 * projected recurring-transaction instances based on:
 * - Date offset within a day tolerance
 * - Amount variance within a percent/absolute tolerance
 * - Description similarity (token overlap, containment, edit distance)
 *
 * Usage:
 * ```typescript
 * import { findMatches, DEFAULT_MATCHING_TOLERANCES } from './matching';
 *
 * const candidates = findMatches(transaction, instances, DEFAULT_MATCHING_TOLERANCES);
 * console.log(candidates[0]?.confidenceLevel); // 'high' | 'medium' | 'low'
 * ```
 */

// Main function
export { findMatches } from './findMatches';

// Tolerances and weights
export {
  createMatchingTolerances,
  withDefaultTolerances,
  tolerancesEqual,
  createScoringWeights,
  DEFAULT_MATCHING_TOLERANCES,
  DEFAULT_SCORING_WEIGHTS,
} from './tolerances';

// Individual scoring functions (for testing/debugging)
export { normalizeDescription, tokenizeDescription } from './normalizeDescription';
export {
  calculateDescriptionSimilarity,
  compareNormalizedDescriptions,
} from './descriptionSimilarity';
export {
  allowedAmountVariance,
  calculateDateProximity,
  calculateAmountProximity,
} from './proximity';
export {
  calculateConfidence,
  determineConfidenceLevel,
  generateExplanation,
  roundScore,
} from './confidenceCalculator';

// Constants
export { CONFIDENCE_LEVEL_THRESHOLDS, DEFAULT_WEIGHTS, NOISE_WORDS } from './constants';

// Types
export type {
  ImportedTransactionInput,
  MatchingTolerances,
  MatchingTolerancesInput,
  ScoringWeights,
  ConfidenceLevel,
  ConfidenceBreakdown,
  MatchCandidate,
} from './types';
