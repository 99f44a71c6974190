/**
 * Type Definitions for Recurring Transactions
 *
 * A recurring transaction is a template for a periodic expected cash flow.
 * The projector expands it into dated instances; nothing here is persisted
 * per occurrence.
 */

import type Decimal from 'decimal.js';
import type { IsoDate } from '../utils/dateOnly';

// ============================================
// RECURRENCE PATTERNS
// ============================================

export type RecurrenceFrequency =
  | 'daily'
  | 'weekly'
  | 'biweekly'
  | 'monthly'
  | 'quarterly'
  | 'yearly';

export interface DailyPattern {
  frequency: 'daily';
  interval: number;
}

export interface WeeklyPattern {
  frequency: 'weekly';
  interval: number;
  /** 0 = Sunday … 6 = Saturday */
  dayOfWeek: number;
}

export interface BiweeklyPattern {
  frequency: 'biweekly';
  dayOfWeek: number;
}

export interface MonthlyPattern {
  frequency: 'monthly';
  interval: number;
  /** 1-31, clamped to the month's length */
  dayOfMonth: number;
}

export interface QuarterlyPattern {
  frequency: 'quarterly';
  dayOfMonth: number;
}

export interface YearlyPattern {
  frequency: 'yearly';
  monthOfYear: number;
  dayOfMonth: number;
}

export type RecurrencePattern =
  | DailyPattern
  | WeeklyPattern
  | BiweeklyPattern
  | MonthlyPattern
  | QuarterlyPattern
  | YearlyPattern;

// ============================================
// RECURRING TRANSACTIONS
// ============================================

/**
 * `shared` rows belong to the household; `personal` rows to one user.
 */
export type OwnershipScope = 'shared' | 'personal';

export interface RecurringTransaction {
  id: string;
  description: string;
  expectedAmount: Decimal;
  currency: string;
  pattern: RecurrencePattern;
  startDate: IsoDate;
  endDate: IsoDate | null;
  isActive: boolean;
  scope: OwnershipScope;
  ownerUserId: string | null;
}

export type ExceptionType = 'skip' | 'modify';

/**
 * Per-date override of one occurrence.
 */
export interface RecurringTransactionException {
  recurringTransactionId: string;
  originalDate: IsoDate;
  type: ExceptionType;
  modifiedAmount: Decimal | null;
  modifiedDescription: string | null;
}

// ============================================
// PROJECTED INSTANCES
// ============================================

/**
 * One concrete occurrence. Identified by (recurringTransactionId, instanceDate).
 */
export interface RecurringScheduleInstance {
  readonly recurringTransactionId: string;
  readonly instanceDate: IsoDate;
  readonly expectedAmount: Decimal;
  readonly currency: string;
  readonly description: string;
  readonly isSkipped: boolean;
  readonly isModified: boolean;
}

export interface ProjectionOptions {
  /** Keep skipped dates in the result, flagged with `isSkipped` */
  includeSkipped?: boolean;
}

/**
 * Instances keyed by date, in ascending date order.
 */
export type ProjectedInstances = Map<IsoDate, RecurringScheduleInstance[]>;
