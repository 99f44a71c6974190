/**
 * Tests for Confidence Score Calculator
 *
 * Formula: confidence = 0.25 × date + 0.55 × amount + 0.20 × description
 *
 * Levels:
 * - high: ≥ 0.85
 * - medium: 0.60 - 0.85
 * - low: < 0.60
 */

import Decimal from 'decimal.js';
import {
  calculateConfidence,
  determineConfidenceLevel,
  generateExplanation,
  roundScore,
} from '../../src/matching/confidenceCalculator';
import { createScoringWeights } from '../../src/matching/tolerances';

describe('roundScore', () => {
  it('should round to four decimals', () => {
    expect(roundScore(2 / 3)).toBe(0.6667);
    expect(roundScore(0.12344)).toBe(0.1234);
    expect(roundScore(1)).toBe(1);
  });
});

describe('calculateConfidence', () => {
  it('should be 1 when every factor is perfect', () => {
    expect(
      calculateConfidence({ dateProximity: 1, amountProximity: 1, descriptionSimilarity: 1 })
    ).toBe(1);
  });

  it('should be 0 when every factor is 0', () => {
    expect(
      calculateConfidence({ dateProximity: 0, amountProximity: 0, descriptionSimilarity: 0 })
    ).toBe(0);
  });

  it('should blend a one-day offset into 0.9167', () => {
    expect(
      calculateConfidence({ dateProximity: 2 / 3, amountProximity: 1, descriptionSimilarity: 1 })
    ).toBe(0.9167);
  });

  it('should give 0.75 at the edge of the date tolerance', () => {
    expect(
      calculateConfidence({ dateProximity: 0, amountProximity: 1, descriptionSimilarity: 1 })
    ).toBe(0.75);
  });

  it('should weigh amount above date', () => {
    const dateMiss = calculateConfidence({
      dateProximity: 0.5,
      amountProximity: 1,
      descriptionSimilarity: 1,
    });
    const amountMiss = calculateConfidence({
      dateProximity: 1,
      amountProximity: 0.5,
      descriptionSimilarity: 1,
    });

    expect(dateMiss).toBe(0.875);
    expect(amountMiss).toBe(0.725);
  });

  it('should honour custom weights', () => {
    const weights = createScoringWeights({ date: 0, amount: 1, description: 0 });

    expect(
      calculateConfidence({ dateProximity: 0, amountProximity: 0.4, descriptionSimilarity: 0 }, weights)
    ).toBe(0.4);
  });

  it('should not decrease when a factor improves', () => {
    let previous = -1;
    for (let step = 0; step <= 10; step++) {
      const score = calculateConfidence({
        dateProximity: step / 10,
        amountProximity: 0.5,
        descriptionSimilarity: 0.5,
      });
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
  });
});

describe('determineConfidenceLevel', () => {
  it('should map scores onto bands', () => {
    expect(determineConfidenceLevel(0.9167)).toBe('high');
    expect(determineConfidenceLevel(0.85)).toBe('high');
    expect(determineConfidenceLevel(0.8499)).toBe('medium');
    expect(determineConfidenceLevel(0.6)).toBe('medium');
    expect(determineConfidenceLevel(0.5999)).toBe('low');
    expect(determineConfidenceLevel(0)).toBe('low');
  });
});

describe('generateExplanation', () => {
  it('should describe a late transaction', () => {
    const explanation = generateExplanation({
      dateOffsetDays: 1,
      amountVariance: new Decimal(0),
      breakdown: { dateProximity: 2 / 3, amountProximity: 1, descriptionSimilarity: 1 },
      confidenceScore: 0.9167,
      confidenceLevel: 'high',
    });

    expect(explanation).toBe(
      'Date offset: +1 day (proximity 0.6667). Amount variance: 0.00 (proximity 1). ' +
        'Description similarity: 1. Confidence: 0.9167 (high)'
    );
  });

  it('should describe an early transaction in plural days', () => {
    const explanation = generateExplanation({
      dateOffsetDays: -2,
      amountVariance: new Decimal('-0.5'),
      breakdown: { dateProximity: 1 / 3, amountProximity: 0.5, descriptionSimilarity: 0.8 },
      confidenceScore: 0.5183,
      confidenceLevel: 'low',
    });

    expect(explanation).toBe(
      'Date offset: -2 days (proximity 0.3333). Amount variance: -0.50 (proximity 0.5). ' +
        'Description similarity: 0.8. Confidence: 0.5183 (low)'
    );
  });

  it('should call a same-day transaction exact', () => {
    const explanation = generateExplanation({
      dateOffsetDays: 0,
      amountVariance: new Decimal('2.5'),
      breakdown: { dateProximity: 1, amountProximity: 0.5, descriptionSimilarity: 1 },
      confidenceScore: 0.725,
      confidenceLevel: 'medium',
    });

    expect(explanation).toBe(
      'Date: exact. Amount variance: 2.50 (proximity 0.5). Description similarity: 1. ' +
        'Confidence: 0.725 (medium)'
    );
  });
});
