/**
 * Audit Service for Reconciliation Matches
 *
 * Records one immutable entry per match decision.
 *
 * RULES:
 * - Every persisted match and every accept/reject gets an entry
 * - Entries are never updated or deleted
 * - "system" for the matching pass, the caller's identifier for user actions
 */

import { randomUUID } from 'crypto';
import type { ReconciliationMatch, MatchStatus } from '../reconciliation/types';
import type { AuditAction, AuditLogEntry, AuditLogRepository } from '../repositories/types';

export const SYSTEM_ACTOR = 'system';

export interface RecordAuditParams {
  match: ReconciliationMatch;
  action: AuditAction;
  previousStatus: MatchStatus | null;
  performedBy: string;
  reason?: string;
  metadata?: Record<string, unknown>;
}

export interface AuditServiceOptions {
  now?: () => Date;
  generateId?: () => string;
}

export class AuditService {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly repository: AuditLogRepository,
    options: AuditServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Appends an entry describing the match's current status.
   */
  async record(params: RecordAuditParams, signal?: AbortSignal): Promise<AuditLogEntry> {
    const entry: AuditLogEntry = {
      id: this.generateId(),
      matchId: params.match.id,
      action: params.action,
      previousStatus: params.previousStatus,
      newStatus: params.match.status,
      performedBy: params.performedBy,
      reason: params.reason ?? null,
      metadata: params.metadata ?? null,
      createdAt: this.now().toISOString(),
    };

    await this.repository.add(entry, signal);
    return entry;
  }

  /**
   * All entries for a match, newest first.
   */
  async getTrailForMatch(matchId: string, signal?: AbortSignal): Promise<AuditLogEntry[]> {
    return this.repository.getByMatch(matchId, signal);
  }
}
