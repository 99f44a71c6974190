/**
 * Constants for the Reconciliation Matching Engine
 *
 * Default tolerances are observable through the API (they apply whenever a
 * caller supplies none), so changing them changes matching behaviour.
 */

import noiseWords from './noiseWords.json';

// ============================================
// DEFAULT TOLERANCES
// ============================================

/**
 * Days an imported transaction may land before or after the scheduled date.
 */
export const DEFAULT_DATE_TOLERANCE_DAYS = 3;

/**
 * Allowed amount deviation as a fraction of the expected amount (1%).
 */
export const DEFAULT_AMOUNT_TOLERANCE_PERCENT = 0.01;

/**
 * Allowed absolute amount deviation, in the transaction's currency.
 * The larger of the percent and absolute allowance applies.
 */
export const DEFAULT_AMOUNT_TOLERANCE_ABSOLUTE = '1.00';

/**
 * Minimum description similarity for a candidate to survive.
 * Ignored when date and amount are both exact.
 */
export const DEFAULT_DESCRIPTION_SIMILARITY_THRESHOLD = 0.6;

/**
 * Candidates scoring at or above this are persisted as auto-matched.
 */
export const DEFAULT_AUTO_MATCH_THRESHOLD = 0.9;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Weights of the confidence blend. Date and amount together dominate;
 * description only corrects.
 *
 * Example (default tolerances, exact amount, same merchant):
 * - transaction 1 day after schedule: 0.25 * (1 - 1/3) + 0.55 + 0.20 = 0.9167 → auto-matched
 * - transaction 3 days after schedule: 0.25 * 0 + 0.55 + 0.20 = 0.75 → suggested
 */
export const DEFAULT_WEIGHTS = {
  DATE: 0.25,
  AMOUNT: 0.55,
  DESCRIPTION: 0.2,
} as const;

// ============================================
// CONFIDENCE LEVELS
// ============================================

export const CONFIDENCE_LEVEL_THRESHOLDS = {
  HIGH: 0.85,
  MEDIUM: 0.6,
} as const;

// ============================================
// NOISE WORDS
// ============================================

/**
 * Tokens that bank descriptions add around a merchant name.
 *
 * - "NETFLIX.COM" → "NETFLIX"
 * - "POS PURCHASE SPOTIFY" → "SPOTIFY"
 * - "ACH DEBIT CITY WATER" → "CITY WATER"
 */
export const NOISE_WORDS: ReadonlySet<string> = new Set(noiseWords);

/**
 * Scores are rounded to this many decimals.
 */
export const SCORE_PRECISION = 4;
