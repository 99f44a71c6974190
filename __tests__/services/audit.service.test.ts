/**
 * Tests for the Audit Service
 */

import Decimal from 'decimal.js';
import { acceptMatch, createReconciliationMatch } from '../../src/reconciliation/reconciliationMatch';
import type { AuditLogEntry, AuditLogRepository } from '../../src/repositories/types';
import { AuditService, SYSTEM_ACTOR } from '../../src/services/audit.service';

class InMemoryAuditLogRepository implements AuditLogRepository {
  readonly entries: AuditLogEntry[] = [];

  async add(entry: AuditLogEntry): Promise<void> {
    this.entries.push(entry);
  }

  async getByMatch(matchId: string): Promise<AuditLogEntry[]> {
    return this.entries.filter((entry) => entry.matchId === matchId).reverse();
  }
}

const match = createReconciliationMatch(
  {
    id: 'match-1',
    importedTransactionId: 'txn-1',
    recurringTransactionId: 'rec-1',
    recurringInstanceDate: '2024-03-15',
    confidenceScore: 0.75,
    source: 'auto',
    amountVariance: new Decimal(0),
    currency: 'USD',
    dateOffsetDays: 2,
    scope: 'shared',
    ownerUserId: null,
  },
  new Date('2024-03-16T10:00:00.000Z')
);

describe('AuditService', () => {
  let repository: InMemoryAuditLogRepository;
  let service: AuditService;
  let nextId: number;

  beforeEach(() => {
    repository = new InMemoryAuditLogRepository();
    nextId = 0;
    service = new AuditService(repository, {
      now: () => new Date('2024-03-17T08:00:00.000Z'),
      generateId: () => `audit-${++nextId}`,
    });
  });

  it('should record the match status as the new status', async () => {
    const entry = await service.record({
      match,
      action: 'suggested',
      previousStatus: null,
      performedBy: SYSTEM_ACTOR,
      metadata: { confidenceScore: 0.75 },
    });

    expect(entry).toEqual({
      id: 'audit-1',
      matchId: 'match-1',
      action: 'suggested',
      previousStatus: null,
      newStatus: 'suggested',
      performedBy: 'system',
      reason: null,
      metadata: { confidenceScore: 0.75 },
      createdAt: '2024-03-17T08:00:00.000Z',
    });
    expect(repository.entries).toEqual([entry]);
  });

  it('should return the trail newest first', async () => {
    await service.record({ match, action: 'suggested', previousStatus: null, performedBy: SYSTEM_ACTOR });
    const accepted = acceptMatch(match, new Date('2024-03-17T08:00:00.000Z'));
    await service.record({
      match: accepted,
      action: 'accepted',
      previousStatus: 'suggested',
      performedBy: 'user-1',
      reason: 'Confirmed on statement',
    });

    const trail = await service.getTrailForMatch('match-1');

    expect(trail.map((entry) => entry.id)).toEqual(['audit-2', 'audit-1']);
    expect(trail[0]).toMatchObject({
      action: 'accepted',
      previousStatus: 'suggested',
      newStatus: 'accepted',
      performedBy: 'user-1',
      reason: 'Confirmed on statement',
    });
  });

  it('should return an empty trail for a match without entries', async () => {
    await expect(service.getTrailForMatch('match-unknown')).resolves.toEqual([]);
  });
});
