/**
 * Repositories Index
 */

import type Database from 'better-sqlite3';
import { SqliteAuditLogRepository } from './auditLog.repository';
import { SqliteReconciliationMatchRepository } from './reconciliationMatch.repository';
import { SqliteRecurringTransactionRepository } from './recurringTransaction.repository';
import { SqliteTransactionRepository } from './transaction.repository';

export interface SqliteRepositories {
  recurringTransactions: SqliteRecurringTransactionRepository;
  transactions: SqliteTransactionRepository;
  matches: SqliteReconciliationMatchRepository;
  auditLogs: SqliteAuditLogRepository;
}

export function createSqliteRepositories(db: Database.Database): SqliteRepositories {
  return {
    recurringTransactions: new SqliteRecurringTransactionRepository(db),
    transactions: new SqliteTransactionRepository(db),
    matches: new SqliteReconciliationMatchRepository(db),
    auditLogs: new SqliteAuditLogRepository(db),
  };
}

export {
  SqliteAuditLogRepository,
  SqliteReconciliationMatchRepository,
  SqliteRecurringTransactionRepository,
  SqliteTransactionRepository,
};

export type {
  Transaction,
  AuditAction,
  AuditLogEntry,
  RecurringTransactionRepository,
  TransactionRepository,
  ReconciliationMatchRepository,
  AuditLogRepository,
  Repositories,
} from './types';
