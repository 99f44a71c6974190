/**
 * Matching tolerances and scoring weights.
 *
 * Both are value objects: validated once, frozen, compared by value.
 */

import Decimal from 'decimal.js';
import { ValidationError } from '../utils/AppError';
import {
  DEFAULT_AMOUNT_TOLERANCE_ABSOLUTE,
  DEFAULT_AMOUNT_TOLERANCE_PERCENT,
  DEFAULT_AUTO_MATCH_THRESHOLD,
  DEFAULT_DATE_TOLERANCE_DAYS,
  DEFAULT_DESCRIPTION_SIMILARITY_THRESHOLD,
  DEFAULT_WEIGHTS,
} from './constants';
import type { MatchingTolerances, MatchingTolerancesInput, ScoringWeights } from './types';

const WEIGHT_SUM_EPSILON = 1e-9;

const isUnitInterval = (value: number): boolean =>
  Number.isFinite(value) && value >= 0 && value <= 1;

function toDecimal(value: Decimal.Value, field: string): Decimal {
  try {
    return new Decimal(value);
  } catch {
    throw new ValidationError(`${field} must be a decimal number`);
  }
}

/**
 * Validates and freezes a set of tolerances.
 *
 * @throws ValidationError when a value is out of range or not finite
 *
 * @example
 * createMatchingTolerances({
 *   dateToleranceDays: 5,
 *   amountTolerancePercent: 0.02,
 *   amountToleranceAbsolute: '2.50',
 *   descriptionSimilarityThreshold: 0.5,
 *   autoMatchThreshold: 0.95,
 * })
 */
export function createMatchingTolerances(input: MatchingTolerancesInput): MatchingTolerances {
  const problems: string[] = [];

  if (!Number.isInteger(input.dateToleranceDays) || input.dateToleranceDays < 0) {
    problems.push('dateToleranceDays must be a non-negative integer');
  }
  if (!isUnitInterval(input.amountTolerancePercent)) {
    problems.push('amountTolerancePercent must be between 0 and 1');
  }

  const amountToleranceAbsolute = toDecimal(
    input.amountToleranceAbsolute,
    'amountToleranceAbsolute'
  );
  if (!amountToleranceAbsolute.isFinite() || amountToleranceAbsolute.isNegative()) {
    problems.push('amountToleranceAbsolute must be a non-negative amount');
  }

  if (!isUnitInterval(input.descriptionSimilarityThreshold)) {
    problems.push('descriptionSimilarityThreshold must be between 0 and 1');
  }
  if (!isUnitInterval(input.autoMatchThreshold)) {
    problems.push('autoMatchThreshold must be between 0 and 1');
  }

  if (problems.length > 0) {
    throw new ValidationError(`Invalid matching tolerances: ${problems.join('; ')}`);
  }

  return Object.freeze({
    dateToleranceDays: input.dateToleranceDays,
    amountTolerancePercent: input.amountTolerancePercent,
    amountToleranceAbsolute,
    descriptionSimilarityThreshold: input.descriptionSimilarityThreshold,
    autoMatchThreshold: input.autoMatchThreshold,
  });
}

export const DEFAULT_MATCHING_TOLERANCES: MatchingTolerances = createMatchingTolerances({
  dateToleranceDays: DEFAULT_DATE_TOLERANCE_DAYS,
  amountTolerancePercent: DEFAULT_AMOUNT_TOLERANCE_PERCENT,
  amountToleranceAbsolute: DEFAULT_AMOUNT_TOLERANCE_ABSOLUTE,
  descriptionSimilarityThreshold: DEFAULT_DESCRIPTION_SIMILARITY_THRESHOLD,
  autoMatchThreshold: DEFAULT_AUTO_MATCH_THRESHOLD,
});

/**
 * Overlays caller-supplied values on the defaults.
 */
export function withDefaultTolerances(
  overrides: Partial<MatchingTolerancesInput> = {}
): MatchingTolerances {
  if (Object.keys(overrides).length === 0) {
    return DEFAULT_MATCHING_TOLERANCES;
  }

  return createMatchingTolerances({
    dateToleranceDays: overrides.dateToleranceDays ?? DEFAULT_MATCHING_TOLERANCES.dateToleranceDays,
    amountTolerancePercent:
      overrides.amountTolerancePercent ?? DEFAULT_MATCHING_TOLERANCES.amountTolerancePercent,
    amountToleranceAbsolute:
      overrides.amountToleranceAbsolute ?? DEFAULT_MATCHING_TOLERANCES.amountToleranceAbsolute,
    descriptionSimilarityThreshold:
      overrides.descriptionSimilarityThreshold ??
      DEFAULT_MATCHING_TOLERANCES.descriptionSimilarityThreshold,
    autoMatchThreshold:
      overrides.autoMatchThreshold ?? DEFAULT_MATCHING_TOLERANCES.autoMatchThreshold,
  });
}

export function tolerancesEqual(a: MatchingTolerances, b: MatchingTolerances): boolean {
  return (
    a.dateToleranceDays === b.dateToleranceDays &&
    a.amountTolerancePercent === b.amountTolerancePercent &&
    a.amountToleranceAbsolute.equals(b.amountToleranceAbsolute) &&
    a.descriptionSimilarityThreshold === b.descriptionSimilarityThreshold &&
    a.autoMatchThreshold === b.autoMatchThreshold
  );
}

/**
 * Validates and freezes a set of scoring weights.
 *
 * @throws ValidationError when a weight is negative or the weights do not sum to 1
 */
export function createScoringWeights(weights: ScoringWeights): ScoringWeights {
  const values = [weights.date, weights.amount, weights.description];

  if (values.some((value) => !Number.isFinite(value) || value < 0)) {
    throw new ValidationError('Scoring weights must be non-negative numbers');
  }

  const sum = values.reduce((total, value) => total + value, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_EPSILON) {
    throw new ValidationError(`Scoring weights must sum to 1 (got ${sum})`);
  }

  return Object.freeze({ ...weights });
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = createScoringWeights({
  date: DEFAULT_WEIGHTS.DATE,
  amount: DEFAULT_WEIGHTS.AMOUNT,
  description: DEFAULT_WEIGHTS.DESCRIPTION,
});
