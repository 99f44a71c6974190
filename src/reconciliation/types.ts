import type Decimal from 'decimal.js';
import type { ConfidenceLevel } from '../matching/types';
import type { OwnershipScope } from '../recurrence/types';
import type { IsoDate } from '../utils/dateOnly';

/**
 * `suggested` and `auto_matched` are initial; `accepted` and `rejected` are terminal.
 */
export type MatchStatus = 'suggested' | 'auto_matched' | 'accepted' | 'rejected';

export type MatchAction = 'auto-match' | 'accept' | 'reject';

/**
 * Who produced the pairing: the matching pass or a user.
 */
export type MatchSource = 'auto' | 'manual';

export interface ReconciliationMatch {
  readonly id: string;
  readonly importedTransactionId: string;
  readonly recurringTransactionId: string;
  readonly recurringInstanceDate: IsoDate;
  readonly confidenceScore: number;
  readonly confidenceLevel: ConfidenceLevel;
  readonly status: MatchStatus;
  readonly source: MatchSource;
  /** expected - actual */
  readonly amountVariance: Decimal;
  readonly currency: string;
  readonly dateOffsetDays: number;
  readonly createdAtUtc: string;
  readonly resolvedAtUtc: string | null;
  readonly scope: OwnershipScope;
  readonly ownerUserId: string | null;
}

export interface CreateReconciliationMatchInput {
  id: string;
  importedTransactionId: string;
  recurringTransactionId: string;
  recurringInstanceDate: IsoDate;
  confidenceScore: number;
  source: MatchSource;
  amountVariance: Decimal;
  currency: string;
  dateOffsetDays: number;
  scope: OwnershipScope;
  ownerUserId: string | null;
}
