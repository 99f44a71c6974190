/**
 * Type Definitions for the Reconciliation Matching Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic - no database or external dependencies.
 */

import type Decimal from 'decimal.js';
import type { IsoDate } from '../utils/dateOnly';

// ============================================
// INPUT TYPES
// ============================================

/**
 * An imported bank transaction to be matched against projected instances.
 */
export interface ImportedTransactionInput {
  id: string;
  /** Booking date of the transaction */
  date: IsoDate;
  amount: Decimal;
  /** ISO-4217 code */
  currency: string;
  /** Raw description from the bank statement */
  description: string;
}

/**
 * Immutable thresholds that decide whether a candidate survives and how it
 * is persisted. Build with `createMatchingTolerances`.
 */
export interface MatchingTolerances {
  readonly dateToleranceDays: number;
  readonly amountTolerancePercent: number;
  readonly amountToleranceAbsolute: Decimal;
  readonly descriptionSimilarityThreshold: number;
  readonly autoMatchThreshold: number;
}

export interface MatchingTolerancesInput {
  dateToleranceDays: number;
  amountTolerancePercent: number;
  amountToleranceAbsolute: Decimal.Value;
  descriptionSimilarityThreshold: number;
  autoMatchThreshold: number;
}

/**
 * Weights of the confidence blend. Each ≥ 0, summing to 1.
 */
export interface ScoringWeights {
  readonly date: number;
  readonly amount: number;
  readonly description: number;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Display band derived from the numeric score. Not stored on its own.
 */
export type ConfidenceLevel = 'high' | 'medium' | 'low';

/**
 * Per-factor scores that went into the blend, each in [0, 1].
 */
export interface ConfidenceBreakdown {
  dateProximity: number;
  amountProximity: number;
  descriptionSimilarity: number;
}

/**
 * One surviving pairing of a transaction with a scheduled instance.
 */
export interface MatchCandidate {
  recurringTransactionId: string;
  instanceDate: IsoDate;
  expectedAmount: Decimal;
  /** Blended score in [0, 1], rounded to 4 decimals */
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  /** expectedAmount - transactionAmount */
  amountVariance: Decimal;
  /** transactionDate - instanceDate, in days */
  dateOffsetDays: number;
  descriptionSimilarity: number;
  breakdown: ConfidenceBreakdown;
  explanation: string;
}
