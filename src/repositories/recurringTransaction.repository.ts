/**
 * Recurring Transaction Repository (SQLite)
 *
 * Read access for the reconciliation service, plus inserts used by the
 * seed script and tests. Authoring schedules is handled elsewhere.
 */

import type Database from 'better-sqlite3';
import Decimal from 'decimal.js';
import { parseRecurrencePattern } from '../recurrence/recurrencePattern';
import type {
  RecurringTransaction,
  RecurringTransactionException,
} from '../recurrence/types';
import type { IsoDate } from '../utils/dateOnly';
import { EXCEPTION_TYPES, OWNERSHIP_SCOPES, parseEnum, placeholders } from './rowMapping';
import type { RecurringTransactionRepository } from './types';

interface RecurringTransactionRow {
  id: string;
  description: string;
  expected_amount: string;
  currency: string;
  pattern: string;
  start_date: string;
  end_date: string | null;
  is_active: number;
  scope: string;
  owner_user_id: string | null;
}

interface ExceptionRow {
  recurring_transaction_id: string;
  original_date: string;
  type: string;
  modified_amount: string | null;
  modified_description: string | null;
}

function toRecurringTransaction(row: RecurringTransactionRow): RecurringTransaction {
  return {
    id: row.id,
    description: row.description,
    expectedAmount: new Decimal(row.expected_amount),
    currency: row.currency,
    pattern: parseRecurrencePattern(JSON.parse(row.pattern)),
    startDate: row.start_date,
    endDate: row.end_date,
    isActive: row.is_active === 1,
    scope: parseEnum(OWNERSHIP_SCOPES, row.scope, 'recurring_transactions.scope'),
    ownerUserId: row.owner_user_id,
  };
}

function toException(row: ExceptionRow): RecurringTransactionException {
  return {
    recurringTransactionId: row.recurring_transaction_id,
    originalDate: row.original_date,
    type: parseEnum(EXCEPTION_TYPES, row.type, 'recurring_transaction_exceptions.type'),
    modifiedAmount: row.modified_amount === null ? null : new Decimal(row.modified_amount),
    modifiedDescription: row.modified_description,
  };
}

export class SqliteRecurringTransactionRepository implements RecurringTransactionRepository {
  constructor(private readonly db: Database.Database) {}

  async getActive(signal?: AbortSignal): Promise<RecurringTransaction[]> {
    signal?.throwIfAborted();
    const rows = this.db
      .prepare<[], RecurringTransactionRow>(
        `SELECT * FROM recurring_transactions WHERE is_active = 1 ORDER BY id`
      )
      .all();
    return rows.map(toRecurringTransaction);
  }

  async getById(id: string, signal?: AbortSignal): Promise<RecurringTransaction | null> {
    signal?.throwIfAborted();
    const row = this.db
      .prepare<[string], RecurringTransactionRow>(`SELECT * FROM recurring_transactions WHERE id = ?`)
      .get(id);
    return row ? toRecurringTransaction(row) : null;
  }

  async getExceptionsInRange(
    recurringTransactionIds: readonly string[],
    start: IsoDate,
    end: IsoDate,
    signal?: AbortSignal
  ): Promise<RecurringTransactionException[]> {
    signal?.throwIfAborted();
    if (recurringTransactionIds.length === 0) {
      return [];
    }

    const rows = this.db
      .prepare<string[], ExceptionRow>(
        `SELECT * FROM recurring_transaction_exceptions
         WHERE recurring_transaction_id IN (${placeholders(recurringTransactionIds.length)})
           AND original_date BETWEEN ? AND ?
         ORDER BY recurring_transaction_id, original_date`
      )
      .all(...recurringTransactionIds, start, end);
    return rows.map(toException);
  }

  insert(recurring: RecurringTransaction): void {
    this.db
      .prepare(
        `INSERT INTO recurring_transactions
           (id, description, expected_amount, currency, pattern, start_date, end_date,
            is_active, scope, owner_user_id)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        recurring.id,
        recurring.description,
        recurring.expectedAmount.toFixed(),
        recurring.currency,
        JSON.stringify(recurring.pattern),
        recurring.startDate,
        recurring.endDate,
        recurring.isActive ? 1 : 0,
        recurring.scope,
        recurring.ownerUserId
      );
  }

  insertException(id: string, exception: RecurringTransactionException): void {
    this.db
      .prepare(
        `INSERT INTO recurring_transaction_exceptions
           (id, recurring_transaction_id, original_date, type, modified_amount, modified_description)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        exception.recurringTransactionId,
        exception.originalDate,
        exception.type,
        exception.modifiedAmount === null ? null : exception.modifiedAmount.toFixed(),
        exception.modifiedDescription
      );
  }
}
