/**
 * Reconciliation Match Repository (SQLite)
 *
 * The UNIQUE constraint on (imported_transaction_id, recurring_transaction_id,
 * recurring_instance_date) backs the service's existence check: an insert
 * that loses a race reports `false` instead of creating a second row.
 */

import type Database from 'better-sqlite3';
import Decimal from 'decimal.js';
import { determineConfidenceLevel } from '../matching/confidenceCalculator';
import type { MatchStatus, ReconciliationMatch } from '../reconciliation/types';
import { monthBounds, type IsoDate } from '../utils/dateOnly';
import { MATCH_SOURCES, MATCH_STATUSES, OWNERSHIP_SCOPES, parseEnum } from './rowMapping';
import type { ReconciliationMatchRepository } from './types';

interface MatchRow {
  id: string;
  imported_transaction_id: string;
  recurring_transaction_id: string;
  recurring_instance_date: string;
  confidence_score: number;
  status: string;
  source: string;
  amount_variance: string;
  currency: string;
  date_offset_days: number;
  created_at_utc: string;
  resolved_at_utc: string | null;
  scope: string;
  owner_user_id: string | null;
}

function toMatch(row: MatchRow): ReconciliationMatch {
  return {
    id: row.id,
    importedTransactionId: row.imported_transaction_id,
    recurringTransactionId: row.recurring_transaction_id,
    recurringInstanceDate: row.recurring_instance_date,
    confidenceScore: row.confidence_score,
    confidenceLevel: determineConfidenceLevel(row.confidence_score),
    status: parseEnum(MATCH_STATUSES, row.status, 'reconciliation_matches.status'),
    source: parseEnum(MATCH_SOURCES, row.source, 'reconciliation_matches.source'),
    amountVariance: new Decimal(row.amount_variance),
    currency: row.currency,
    dateOffsetDays: row.date_offset_days,
    createdAtUtc: row.created_at_utc,
    resolvedAtUtc: row.resolved_at_utc,
    scope: parseEnum(OWNERSHIP_SCOPES, row.scope, 'reconciliation_matches.scope'),
    ownerUserId: row.owner_user_id,
  };
}

const ORDER_BY = `ORDER BY created_at_utc, rowid`;

export class SqliteReconciliationMatchRepository implements ReconciliationMatchRepository {
  constructor(private readonly db: Database.Database) {}

  async exists(
    transactionId: string,
    recurringTransactionId: string,
    instanceDate: IsoDate,
    signal?: AbortSignal
  ): Promise<boolean> {
    signal?.throwIfAborted();
    const row = this.db
      .prepare<[string, string, string], { found: number }>(
        `SELECT 1 AS found FROM reconciliation_matches
         WHERE imported_transaction_id = ? AND recurring_transaction_id = ? AND recurring_instance_date = ?`
      )
      .get(transactionId, recurringTransactionId, instanceDate);
    return row !== undefined;
  }

  async add(match: ReconciliationMatch, signal?: AbortSignal): Promise<boolean> {
    signal?.throwIfAborted();
    const result = this.db
      .prepare(
        `INSERT INTO reconciliation_matches
           (id, imported_transaction_id, recurring_transaction_id, recurring_instance_date,
            confidence_score, status, source, amount_variance, currency, date_offset_days,
            created_at_utc, resolved_at_utc, scope, owner_user_id)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (imported_transaction_id, recurring_transaction_id, recurring_instance_date)
         DO NOTHING`
      )
      .run(
        match.id,
        match.importedTransactionId,
        match.recurringTransactionId,
        match.recurringInstanceDate,
        match.confidenceScore,
        match.status,
        match.source,
        match.amountVariance.toFixed(),
        match.currency,
        match.dateOffsetDays,
        match.createdAtUtc,
        match.resolvedAtUtc,
        match.scope,
        match.ownerUserId
      );
    return result.changes > 0;
  }

  /**
   * Persists a state transition. The pairing and score are never rewritten.
   */
  async update(
    match: ReconciliationMatch,
    expectedStatus: MatchStatus,
    signal?: AbortSignal
  ): Promise<boolean> {
    signal?.throwIfAborted();
    const result = this.db
      .prepare(
        `UPDATE reconciliation_matches SET status = ?, resolved_at_utc = ?
         WHERE id = ? AND status = ?`
      )
      .run(match.status, match.resolvedAtUtc, match.id, expectedStatus);
    return result.changes > 0;
  }

  async getById(id: string, signal?: AbortSignal): Promise<ReconciliationMatch | null> {
    signal?.throwIfAborted();
    const row = this.db
      .prepare<[string], MatchRow>(`SELECT * FROM reconciliation_matches WHERE id = ?`)
      .get(id);
    return row ? toMatch(row) : null;
  }

  async getByTriple(
    transactionId: string,
    recurringTransactionId: string,
    instanceDate: IsoDate,
    signal?: AbortSignal
  ): Promise<ReconciliationMatch | null> {
    signal?.throwIfAborted();
    const row = this.db
      .prepare<[string, string, string], MatchRow>(
        `SELECT * FROM reconciliation_matches
         WHERE imported_transaction_id = ? AND recurring_transaction_id = ? AND recurring_instance_date = ?`
      )
      .get(transactionId, recurringTransactionId, instanceDate);
    return row ? toMatch(row) : null;
  }

  async getPending(signal?: AbortSignal): Promise<ReconciliationMatch[]> {
    signal?.throwIfAborted();
    return this.db
      .prepare<[], MatchRow>(`SELECT * FROM reconciliation_matches WHERE status = 'suggested' ${ORDER_BY}`)
      .all()
      .map(toMatch);
  }

  async getByRecurringTransaction(
    recurringTransactionId: string,
    start: IsoDate,
    end: IsoDate,
    signal?: AbortSignal
  ): Promise<ReconciliationMatch[]> {
    signal?.throwIfAborted();
    return this.db
      .prepare<[string, string, string], MatchRow>(
        `SELECT * FROM reconciliation_matches
         WHERE recurring_transaction_id = ? AND recurring_instance_date BETWEEN ? AND ?
         ORDER BY recurring_instance_date, created_at_utc, rowid`
      )
      .all(recurringTransactionId, start, end)
      .map(toMatch);
  }

  async getByPeriod(year: number, month: number, signal?: AbortSignal): Promise<ReconciliationMatch[]> {
    signal?.throwIfAborted();
    const { start, end } = monthBounds(year, month);
    return this.db
      .prepare<[string, string], MatchRow>(
        `SELECT * FROM reconciliation_matches
         WHERE recurring_instance_date BETWEEN ? AND ?
         ORDER BY recurring_instance_date, created_at_utc, rowid`
      )
      .all(start, end)
      .map(toMatch);
  }
}
