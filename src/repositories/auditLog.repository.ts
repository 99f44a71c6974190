/**
 * Audit Log Repository (SQLite)
 *
 * Append-only: entries are never updated or deleted here. They go away
 * only when the match they describe is deleted.
 */

import type Database from 'better-sqlite3';
import { AUDIT_ACTIONS, MATCH_STATUSES, parseEnum } from './rowMapping';
import type { AuditLogEntry, AuditLogRepository } from './types';

interface AuditLogRow {
  id: string;
  match_id: string;
  action: string;
  previous_status: string | null;
  new_status: string;
  performed_by: string;
  reason: string | null;
  metadata: string | null;
  created_at: string;
}

function parseMetadata(value: string | null): Record<string, unknown> | null {
  if (value === null) {
    return null;
  }
  const parsed: unknown = JSON.parse(value);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

function toAuditLogEntry(row: AuditLogRow): AuditLogEntry {
  return {
    id: row.id,
    matchId: row.match_id,
    action: parseEnum(AUDIT_ACTIONS, row.action, 'match_audit_logs.action'),
    previousStatus:
      row.previous_status === null
        ? null
        : parseEnum(MATCH_STATUSES, row.previous_status, 'match_audit_logs.previous_status'),
    newStatus: parseEnum(MATCH_STATUSES, row.new_status, 'match_audit_logs.new_status'),
    performedBy: row.performed_by,
    reason: row.reason,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
  };
}

export class SqliteAuditLogRepository implements AuditLogRepository {
  constructor(private readonly db: Database.Database) {}

  async add(entry: AuditLogEntry, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.db
      .prepare(
        `INSERT INTO match_audit_logs
           (id, match_id, action, previous_status, new_status, performed_by, reason, metadata, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        entry.id,
        entry.matchId,
        entry.action,
        entry.previousStatus,
        entry.newStatus,
        entry.performedBy,
        entry.reason,
        entry.metadata === null ? null : JSON.stringify(entry.metadata),
        entry.createdAt
      );
  }

  async getByMatch(matchId: string, signal?: AbortSignal): Promise<AuditLogEntry[]> {
    signal?.throwIfAborted();
    return this.db
      .prepare<[string], AuditLogRow>(
        `SELECT * FROM match_audit_logs WHERE match_id = ? ORDER BY created_at DESC, rowid DESC`
      )
      .all(matchId)
      .map(toAuditLogEntry);
  }
}
