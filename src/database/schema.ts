/**
 * Database Schema
 *
 * Amounts are stored as canonical decimal strings, calendar dates as
 * YYYY-MM-DD and timestamps as ISO-8601 UTC strings.
 */

import type Database from 'better-sqlite3';

export const SCHEMA = `
-- Recurring transaction templates (authored elsewhere, read here)
CREATE TABLE IF NOT EXISTS recurring_transactions (
  id TEXT PRIMARY KEY,
  description TEXT NOT NULL,
  expected_amount TEXT NOT NULL,
  currency TEXT NOT NULL DEFAULT 'USD',
  pattern TEXT NOT NULL, -- JSON recurrence pattern
  start_date TEXT NOT NULL,
  end_date TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  scope TEXT NOT NULL DEFAULT 'shared' CHECK(scope IN ('shared', 'personal')),
  owner_user_id TEXT
);

-- Per-date skip/modify overrides
CREATE TABLE IF NOT EXISTS recurring_transaction_exceptions (
  id TEXT PRIMARY KEY,
  recurring_transaction_id TEXT NOT NULL
    REFERENCES recurring_transactions(id) ON DELETE CASCADE,
  original_date TEXT NOT NULL,
  type TEXT NOT NULL CHECK(type IN ('skip', 'modify')),
  modified_amount TEXT,
  modified_description TEXT,
  UNIQUE (recurring_transaction_id, original_date, type)
);

-- Imported bank transactions
CREATE TABLE IF NOT EXISTS transactions (
  id TEXT PRIMARY KEY,
  date TEXT NOT NULL,
  amount TEXT NOT NULL,
  currency TEXT NOT NULL DEFAULT 'USD',
  description TEXT NOT NULL,
  linked_recurring_transaction_id TEXT
    REFERENCES recurring_transactions(id) ON DELETE SET NULL,
  linked_instance_date TEXT
);

CREATE TABLE IF NOT EXISTS reconciliation_matches (
  id TEXT PRIMARY KEY,
  imported_transaction_id TEXT NOT NULL
    REFERENCES transactions(id) ON DELETE CASCADE,
  recurring_transaction_id TEXT NOT NULL
    REFERENCES recurring_transactions(id) ON DELETE CASCADE,
  recurring_instance_date TEXT NOT NULL,
  confidence_score REAL NOT NULL CHECK(confidence_score BETWEEN 0 AND 1),
  status TEXT NOT NULL
    CHECK(status IN ('suggested', 'auto_matched', 'accepted', 'rejected')),
  source TEXT NOT NULL CHECK(source IN ('auto', 'manual')),
  amount_variance TEXT NOT NULL,
  currency TEXT NOT NULL,
  date_offset_days INTEGER NOT NULL,
  created_at_utc TEXT NOT NULL,
  resolved_at_utc TEXT,
  scope TEXT NOT NULL CHECK(scope IN ('shared', 'personal')),
  owner_user_id TEXT,
  UNIQUE (imported_transaction_id, recurring_transaction_id, recurring_instance_date)
);

-- Immutable decision history
CREATE TABLE IF NOT EXISTS match_audit_logs (
  id TEXT PRIMARY KEY,
  match_id TEXT NOT NULL REFERENCES reconciliation_matches(id) ON DELETE CASCADE,
  action TEXT NOT NULL
    CHECK(action IN ('suggested', 'auto_matched', 'manual_matched', 'accepted', 'rejected')),
  previous_status TEXT,
  new_status TEXT NOT NULL,
  performed_by TEXT NOT NULL,
  reason TEXT,
  metadata TEXT, -- JSON object
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_exceptions_recurring_date
  ON recurring_transaction_exceptions(recurring_transaction_id, original_date);
CREATE INDEX IF NOT EXISTS idx_matches_status ON reconciliation_matches(status);
CREATE INDEX IF NOT EXISTS idx_matches_instance_date
  ON reconciliation_matches(recurring_instance_date);
CREATE INDEX IF NOT EXISTS idx_matches_recurring
  ON reconciliation_matches(recurring_transaction_id, recurring_instance_date);
CREATE INDEX IF NOT EXISTS idx_audit_logs_match ON match_audit_logs(match_id, created_at);
`;

export function initializeSchema(db: Database.Database): void {
  db.exec(SCHEMA);
}
