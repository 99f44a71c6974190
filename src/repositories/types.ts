/**
 * Repository contracts consumed by the reconciliation service.
 *
 * Every method accepts an optional AbortSignal and checks it before
 * touching storage. Lookups return null for unknown ids.
 */

import type { ImportedTransactionInput } from '../matching/types';
import type {
  RecurringTransaction,
  RecurringTransactionException,
} from '../recurrence/types';
import type { MatchStatus, ReconciliationMatch } from '../reconciliation/types';
import type { IsoDate } from '../utils/dateOnly';

/**
 * An imported bank transaction, optionally linked to the recurring
 * instance it settles.
 */
export interface Transaction extends ImportedTransactionInput {
  linkedRecurringTransactionId: string | null;
  linkedInstanceDate: IsoDate | null;
}

export type AuditAction = 'suggested' | 'auto_matched' | 'manual_matched' | 'accepted' | 'rejected';

export interface AuditLogEntry {
  id: string;
  matchId: string;
  action: AuditAction;
  previousStatus: MatchStatus | null;
  newStatus: MatchStatus;
  performedBy: string;
  reason: string | null;
  metadata: Record<string, unknown> | null;
  createdAt: string;
}

export interface RecurringTransactionRepository {
  getActive(signal?: AbortSignal): Promise<RecurringTransaction[]>;
  getById(id: string, signal?: AbortSignal): Promise<RecurringTransaction | null>;
  getExceptionsInRange(
    recurringTransactionIds: readonly string[],
    start: IsoDate,
    end: IsoDate,
    signal?: AbortSignal
  ): Promise<RecurringTransactionException[]>;
}

export interface TransactionRepository {
  getById(id: string, signal?: AbortSignal): Promise<Transaction | null>;
  linkToRecurringInstance(
    transactionId: string,
    recurringTransactionId: string,
    instanceDate: IsoDate,
    signal?: AbortSignal
  ): Promise<void>;
}

export interface ReconciliationMatchRepository {
  exists(
    transactionId: string,
    recurringTransactionId: string,
    instanceDate: IsoDate,
    signal?: AbortSignal
  ): Promise<boolean>;
  /**
   * @returns false when a match for the same triple is already stored
   */
  add(match: ReconciliationMatch, signal?: AbortSignal): Promise<boolean>;
  /**
   * Writes a transition only if the stored status is still `expectedStatus`.
   * @returns false when another decision got there first
   */
  update(
    match: ReconciliationMatch,
    expectedStatus: MatchStatus,
    signal?: AbortSignal
  ): Promise<boolean>;
  getById(id: string, signal?: AbortSignal): Promise<ReconciliationMatch | null>;
  getByTriple(
    transactionId: string,
    recurringTransactionId: string,
    instanceDate: IsoDate,
    signal?: AbortSignal
  ): Promise<ReconciliationMatch | null>;
  getPending(signal?: AbortSignal): Promise<ReconciliationMatch[]>;
  getByRecurringTransaction(
    recurringTransactionId: string,
    start: IsoDate,
    end: IsoDate,
    signal?: AbortSignal
  ): Promise<ReconciliationMatch[]>;
  getByPeriod(year: number, month: number, signal?: AbortSignal): Promise<ReconciliationMatch[]>;
}

export interface AuditLogRepository {
  add(entry: AuditLogEntry, signal?: AbortSignal): Promise<void>;
  /** Newest first */
  getByMatch(matchId: string, signal?: AbortSignal): Promise<AuditLogEntry[]>;
}

export interface Repositories {
  recurringTransactions: RecurringTransactionRepository;
  transactions: TransactionRepository;
  matches: ReconciliationMatchRepository;
  auditLogs: AuditLogRepository;
}
