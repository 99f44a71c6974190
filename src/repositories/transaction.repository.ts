/**
 * Transaction Repository (SQLite)
 *
 * Imported bank transactions. Importing itself happens elsewhere; this
 * repository only reads them and records recurring-instance links.
 */

import type Database from 'better-sqlite3';
import Decimal from 'decimal.js';
import type { IsoDate } from '../utils/dateOnly';
import type { Transaction, TransactionRepository } from './types';

interface TransactionRow {
  id: string;
  date: string;
  amount: string;
  currency: string;
  description: string;
  linked_recurring_transaction_id: string | null;
  linked_instance_date: string | null;
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    date: row.date,
    amount: new Decimal(row.amount),
    currency: row.currency,
    description: row.description,
    linkedRecurringTransactionId: row.linked_recurring_transaction_id,
    linkedInstanceDate: row.linked_instance_date,
  };
}

export class SqliteTransactionRepository implements TransactionRepository {
  constructor(private readonly db: Database.Database) {}

  async getById(id: string, signal?: AbortSignal): Promise<Transaction | null> {
    signal?.throwIfAborted();
    const row = this.db
      .prepare<[string], TransactionRow>(`SELECT * FROM transactions WHERE id = ?`)
      .get(id);
    return row ? toTransaction(row) : null;
  }

  async linkToRecurringInstance(
    transactionId: string,
    recurringTransactionId: string,
    instanceDate: IsoDate,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    this.db
      .prepare(
        `UPDATE transactions
         SET linked_recurring_transaction_id = ?, linked_instance_date = ?
         WHERE id = ?`
      )
      .run(recurringTransactionId, instanceDate, transactionId);
  }

  insert(transaction: Transaction): void {
    this.db
      .prepare(
        `INSERT INTO transactions
           (id, date, amount, currency, description, linked_recurring_transaction_id, linked_instance_date)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        transaction.id,
        transaction.date,
        transaction.amount.toFixed(),
        transaction.currency,
        transaction.description,
        transaction.linkedRecurringTransactionId,
        transaction.linkedInstanceDate
      );
  }
}
