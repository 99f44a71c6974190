/**
 * Confidence Score Calculator for Reconciliation Matching
 *
 * Blends three signals into one score in [0, 1]:
 * 1. Date proximity (weight 0.25 by default)
 * 2. Amount proximity (weight 0.55 by default)
 * 3. Description similarity (weight 0.20 by default)
 *
 * Formula: confidence = w.date × date + w.amount × amount + w.description × description
 *
 * Levels (display only):
 * - high: ≥ 0.85
 * - medium: 0.60 - 0.85
 * - low: < 0.60
 */

import type Decimal from 'decimal.js';
import { CONFIDENCE_LEVEL_THRESHOLDS, SCORE_PRECISION } from './constants';
import { DEFAULT_SCORING_WEIGHTS } from './tolerances';
import type { ConfidenceBreakdown, ConfidenceLevel, ScoringWeights } from './types';

const SCORE_FACTOR = 10 ** SCORE_PRECISION;

export function roundScore(value: number): number {
  return Math.round(value * SCORE_FACTOR) / SCORE_FACTOR;
}

/**
 * @example
 * calculateConfidence({ dateProximity: 2 / 3, amountProximity: 1, descriptionSimilarity: 1 })
 * // 0.9167
 */
export function calculateConfidence(
  breakdown: ConfidenceBreakdown,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): number {
  const rawTotal =
    weights.date * breakdown.dateProximity +
    weights.amount * breakdown.amountProximity +
    weights.description * breakdown.descriptionSimilarity;

  return roundScore(Math.max(0, Math.min(1, rawTotal)));
}

export function determineConfidenceLevel(confidenceScore: number): ConfidenceLevel {
  if (confidenceScore >= CONFIDENCE_LEVEL_THRESHOLDS.HIGH) {
    return 'high';
  }
  if (confidenceScore >= CONFIDENCE_LEVEL_THRESHOLDS.MEDIUM) {
    return 'medium';
  }
  return 'low';
}

export interface ExplanationParams {
  dateOffsetDays: number;
  amountVariance: Decimal;
  breakdown: ConfidenceBreakdown;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
}

/**
 * Generates a human-readable explanation of the confidence calculation.
 *
 * @example
 * // "Date offset: +1 day (proximity 0.6667). Amount variance: 0.00 (proximity 1).
 * //  Description similarity: 1. Confidence: 0.9167 (high)"
 */
export function generateExplanation(params: ExplanationParams): string {
  const { dateOffsetDays, amountVariance, breakdown, confidenceScore, confidenceLevel } = params;
  const parts: string[] = [];

  if (dateOffsetDays === 0) {
    parts.push('Date: exact');
  } else {
    const signed = dateOffsetDays > 0 ? `+${dateOffsetDays}` : `${dateOffsetDays}`;
    const unit = Math.abs(dateOffsetDays) === 1 ? 'day' : 'days';
    parts.push(`Date offset: ${signed} ${unit} (proximity ${roundScore(breakdown.dateProximity)})`);
  }

  parts.push(
    `Amount variance: ${amountVariance.toFixed(2)} (proximity ${roundScore(breakdown.amountProximity)})`
  );
  parts.push(`Description similarity: ${breakdown.descriptionSimilarity}`);
  parts.push(`Confidence: ${confidenceScore} (${confidenceLevel})`);

  return parts.join('. ');
}

export default calculateConfidence;
