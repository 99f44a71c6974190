/**
 * DTOs returned by the reconciliation service.
 *
 * Amounts are rendered as strings with two decimals ("15.99").
 */

import { z } from 'zod';
import type { ConfidenceLevel, MatchingTolerancesInput } from '../matching/types';
import type { OwnershipScope } from '../recurrence/types';
import type { MatchSource, MatchStatus } from '../reconciliation/types';
import type { IsoDate } from '../utils/dateOnly';

// ============================================
// Shared
// ============================================

const moneySchema = z.object({
  amount: z.string(),
  currency: z.string(),
});

export type MoneyDto = z.infer<typeof moneySchema>;

export interface TransactionSummaryDto {
  id: string;
  date: IsoDate;
  amount: MoneyDto;
  description: string;
}

// ============================================
// Matches
// ============================================

export interface MatchDto {
  id: string;
  importedTransactionId: string;
  recurringTransactionId: string;
  recurringInstanceDate: IsoDate;
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  status: MatchStatus;
  source: MatchSource;
  amountVariance: string;
  dateOffsetDays: number;
  createdAtUtc: string;
  resolvedAtUtc: string | null;
  scope: OwnershipScope;
  ownerUserId: string | null;
  /** null when the transaction could not be loaded */
  importedTransaction: TransactionSummaryDto | null;
  recurringTransactionDescription: string | null;
  expectedAmount: MoneyDto | null;
}

export interface FindMatchesRequest {
  transactionIds: string[];
  startDate: IsoDate;
  endDate: IsoDate;
  /** Missing fields fall back to the defaults */
  tolerances?: Partial<MatchingTolerancesInput>;
}

export interface FindMatchesResult {
  matchesByTransaction: Record<string, MatchDto[]>;
  totalMatchesFound: number;
  highConfidenceCount: number;
}

export interface ManualMatchRequest {
  transactionId: string;
  recurringTransactionId: string;
  instanceDate: IsoDate;
}

export interface BulkAcceptResult {
  accepted: MatchDto[];
  acceptedCount: number;
  failedCount: number;
}

// ============================================
// Status report (cached as JSON, hence the schema)
// ============================================

const instanceStatusSchema = z.object({
  recurringTransactionId: z.string(),
  description: z.string(),
  instanceDate: z.string(),
  expectedAmount: moneySchema,
  status: z.enum(['matched', 'pending', 'missing']),
  matchedTransactionId: z.string().nullable(),
  actualAmount: moneySchema.nullable(),
  amountVariance: z.string().nullable(),
  matchId: z.string().nullable(),
  matchSource: z.enum(['auto', 'manual']).nullable(),
});

export const reconciliationStatusSchema = z.object({
  year: z.number().int(),
  month: z.number().int(),
  totalExpectedInstances: z.number().int(),
  matchedCount: z.number().int(),
  pendingCount: z.number().int(),
  missingCount: z.number().int(),
  instances: z.array(instanceStatusSchema),
});

export type InstanceStatus = z.infer<typeof instanceStatusSchema>['status'];
export type InstanceStatusDto = z.infer<typeof instanceStatusSchema>;
export type ReconciliationStatusDto = z.infer<typeof reconciliationStatusSchema>;

// ============================================
// Linkable instances
// ============================================

export interface LinkableInstanceDto {
  recurringTransactionId: string;
  description: string;
  expectedAmount: MoneyDto;
  instanceDate: IsoDate;
  /** A non-rejected match already exists for this instance */
  isAlreadyMatched: boolean;
  /** Score under default tolerances, or null when they exclude the pairing */
  suggestedConfidence: number | null;
}
