/**
 * Reconciliation Service
 *
 * Coordinates projection, matching, deduplication and match decisions.
 *
 * RULES:
 * - One match per (transaction, recurring transaction, instance date)
 * - Re-running find-matches over the same window creates nothing new
 * - Unknown ids are an absence (null / skipped), never an exception
 * - accept/reject on a decided match is an InvalidStateTransitionError,
 *   except inside bulk accept, which skips and continues
 *
 * Every method takes an optional AbortSignal, checked at each repository call.
 */

import { randomUUID } from 'crypto';
import type Decimal from 'decimal.js';
import {
  findMatches as scoreTransaction,
  withDefaultTolerances,
  type MatchCandidate,
} from '../matching';
import {
  flattenInstances,
  projectInstances,
  type ProjectionOptions,
  type RecurringScheduleInstance,
  type RecurringTransaction,
} from '../recurrence';
import {
  acceptMatch as acceptTransition,
  autoMatch as autoMatchTransition,
  createReconciliationMatch,
  rejectMatch as rejectTransition,
  type MatchAction,
  type MatchStatus,
  type ReconciliationMatch,
} from '../reconciliation';
import { getStatusWithCache, invalidateStatusCache } from '../redis/statusCache';
import type { AuditLogEntry, Repositories, Transaction } from '../repositories/types';
import { InvalidStateTransitionError, ValidationError } from '../utils/AppError';
import {
  addDays,
  addMonths,
  assertValidRange,
  diffInDays,
  isIsoDate,
  monthBounds,
  parseIsoDate,
  todayUtc,
  type IsoDate,
} from '../utils/dateOnly';
import { logger } from '../utils';
import { AuditService, SYSTEM_ACTOR } from './audit.service';
import {
  reconciliationStatusSchema,
  type BulkAcceptResult,
  type FindMatchesRequest,
  type FindMatchesResult,
  type InstanceStatusDto,
  type LinkableInstanceDto,
  type ManualMatchRequest,
  type MatchDto,
  type MoneyDto,
  type ReconciliationStatusDto,
} from './reconciliation.types';

// ============================================
// Constants
// ============================================

export const DEFAULT_ACTOR = 'user';

/** Window either side of a transaction searched for linkable instances */
export const LINKABLE_WINDOW_DAYS = 15;

/** Window either side of today for a recurring transaction's matches */
const RECURRING_HISTORY_MONTHS = 12;

const MIN_YEAR = 2000;
const MAX_YEAR = 2100;

// ============================================
// Mapping helpers
// ============================================

const toMoney = (amount: Decimal, currency: string): MoneyDto => ({
  amount: amount.toFixed(2),
  currency,
});

const instanceKey = (recurringTransactionId: string, date: IsoDate): string =>
  `${recurringTransactionId}|${date}`;

function toMatchDto(
  match: ReconciliationMatch,
  transaction: Transaction | null,
  recurring: RecurringTransaction | null
): MatchDto {
  return {
    id: match.id,
    importedTransactionId: match.importedTransactionId,
    recurringTransactionId: match.recurringTransactionId,
    recurringInstanceDate: match.recurringInstanceDate,
    confidenceScore: match.confidenceScore,
    confidenceLevel: match.confidenceLevel,
    status: match.status,
    source: match.source,
    amountVariance: match.amountVariance.toFixed(2),
    dateOffsetDays: match.dateOffsetDays,
    createdAtUtc: match.createdAtUtc,
    resolvedAtUtc: match.resolvedAtUtc,
    scope: match.scope,
    ownerUserId: match.ownerUserId,
    importedTransaction: transaction
      ? {
          id: transaction.id,
          date: transaction.date,
          amount: toMoney(transaction.amount, transaction.currency),
          description: transaction.description,
        }
      : null,
    recurringTransactionDescription: recurring?.description ?? null,
    expectedAmount: recurring ? toMoney(recurring.expectedAmount, recurring.currency) : null,
  };
}

function assertValidPeriod(year: number, month: number): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new ValidationError(`Year must be an integer between ${MIN_YEAR} and ${MAX_YEAR}`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new ValidationError('Month must be an integer between 1 and 12');
  }
}

function parseCachedStatus(cached: unknown): ReconciliationStatusDto | null {
  const result = reconciliationStatusSchema.safeParse(cached);
  return result.success ? result.data : null;
}

// ============================================
// Service
// ============================================

export interface ReconciliationServiceOptions {
  auditService?: AuditService;
  now?: () => Date;
  generateId?: () => string;
}

export class ReconciliationService {
  private readonly audit: AuditService;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly repositories: Repositories,
    options: ReconciliationServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.audit =
      options.auditService ??
      new AuditService(repositories.auditLogs, { now: this.now, generateId: this.generateId });
  }

  // ============================================
  // Find matches
  // ============================================

  /**
   * Scores each transaction against every active recurring instance in
   * `[startDate, endDate]` and persists the new pairings.
   *
   * Candidates at or above the auto-match threshold are stored as
   * `auto_matched`; the rest as `suggested`.
   */
  async findMatches(request: FindMatchesRequest, signal?: AbortSignal): Promise<FindMatchesResult> {
    assertValidRange(request.startDate, request.endDate);
    const tolerances = withDefaultTolerances(request.tolerances);

    const { recurringById, instances } = await this.projectActive(
      request.startDate,
      request.endDate,
      {},
      signal
    );

    const matchesByTransaction: Record<string, MatchDto[]> = {};
    const touchedPeriods = new Set<string>();
    let totalMatchesFound = 0;
    let highConfidenceCount = 0;

    for (const transactionId of new Set(request.transactionIds)) {
      const transaction = await this.repositories.transactions.getById(transactionId, signal);
      if (!transaction) {
        logger.debug(`Find matches: transaction ${transactionId} not found, skipping`);
        continue;
      }

      const created: MatchDto[] = [];

      for (const candidate of scoreTransaction(transaction, instances, tolerances)) {
        const recurring = recurringById.get(candidate.recurringTransactionId);
        if (!recurring) {
          continue;
        }

        const match = await this.persistCandidate(
          transaction,
          recurring,
          candidate,
          candidate.confidenceScore >= tolerances.autoMatchThreshold,
          signal
        );
        if (!match) {
          continue;
        }

        if (match.status === 'auto_matched') {
          highConfidenceCount++;
        }
        totalMatchesFound++;
        touchedPeriods.add(match.recurringInstanceDate.slice(0, 7));
        created.push(toMatchDto(match, transaction, recurring));
      }

      if (created.length > 0) {
        matchesByTransaction[transactionId] = created;
      }
    }

    await this.invalidatePeriods(touchedPeriods);

    logger.info(
      `Find matches ${request.startDate}..${request.endDate}: ` +
        `${request.transactionIds.length} transaction(s), ${totalMatchesFound} new match(es), ` +
        `${highConfidenceCount} auto-matched`
    );

    return { matchesByTransaction, totalMatchesFound, highConfidenceCount };
  }

  /**
   * Stores one candidate unless its triple is already taken.
   *
   * @returns The stored match, or null when it already existed
   */
  private async persistCandidate(
    transaction: Transaction,
    recurring: RecurringTransaction,
    candidate: MatchCandidate,
    shouldAutoMatch: boolean,
    signal?: AbortSignal
  ): Promise<ReconciliationMatch | null> {
    const { matches } = this.repositories;

    if (await matches.exists(transaction.id, recurring.id, candidate.instanceDate, signal)) {
      logger.debug(
        `Match ${transaction.id} → ${recurring.id}@${candidate.instanceDate} already exists, skipping`
      );
      return null;
    }

    const suggested = createReconciliationMatch(
      {
        id: this.generateId(),
        importedTransactionId: transaction.id,
        recurringTransactionId: recurring.id,
        recurringInstanceDate: candidate.instanceDate,
        confidenceScore: candidate.confidenceScore,
        source: 'auto',
        amountVariance: candidate.amountVariance,
        currency: transaction.currency,
        dateOffsetDays: candidate.dateOffsetDays,
        scope: recurring.scope,
        ownerUserId: recurring.ownerUserId,
      },
      this.now()
    );
    const match = shouldAutoMatch ? autoMatchTransition(suggested) : suggested;

    // The unique constraint catches a concurrent insert of the same triple
    if (!(await matches.add(match, signal))) {
      logger.debug(
        `Match ${transaction.id} → ${recurring.id}@${candidate.instanceDate} lost insert race`
      );
      return null;
    }

    await this.audit.record(
      {
        match,
        action: match.status === 'auto_matched' ? 'auto_matched' : 'suggested',
        previousStatus: null,
        performedBy: SYSTEM_ACTOR,
        metadata: { explanation: candidate.explanation, breakdown: candidate.breakdown },
      },
      signal
    );
    logger.debug(`Created ${match.status} match ${match.id}: ${candidate.explanation}`);

    return match;
  }

  // ============================================
  // Queries
  // ============================================

  async getPendingMatches(signal?: AbortSignal): Promise<MatchDto[]> {
    const pending = await this.repositories.matches.getPending(signal);
    return this.enrich(pending, signal);
  }

  /**
   * Matches of one recurring transaction whose instance date lies within a
   * year either side of today.
   */
  async getMatchesForRecurringTransaction(
    recurringTransactionId: string,
    signal?: AbortSignal
  ): Promise<MatchDto[]> {
    const today = todayUtc(this.now());
    const matches = await this.repositories.matches.getByRecurringTransaction(
      recurringTransactionId,
      addMonths(today, -RECURRING_HISTORY_MONTHS),
      addMonths(today, RECURRING_HISTORY_MONTHS),
      signal
    );
    return this.enrich(matches, signal);
  }

  async getAuditTrail(matchId: string, signal?: AbortSignal): Promise<AuditLogEntry[] | null> {
    const match = await this.repositories.matches.getById(matchId, signal);
    if (!match) {
      return null;
    }
    return this.audit.getTrailForMatch(matchId, signal);
  }

  // ============================================
  // Decisions
  // ============================================

  /**
   * Accepts a suggested or auto-matched match and links the transaction
   * to the recurring instance.
   *
   * @returns The accepted match, or null when the id is unknown
   * @throws InvalidStateTransitionError when the match is already decided
   */
  async acceptMatch(
    matchId: string,
    performedBy = DEFAULT_ACTOR,
    signal?: AbortSignal
  ): Promise<MatchDto | null> {
    const match = await this.repositories.matches.getById(matchId, signal);
    if (!match) {
      return null;
    }

    const accepted = acceptTransition(match, this.now());
    await this.persistTransition(accepted, match.status, 'accept', signal);
    await this.repositories.transactions.linkToRecurringInstance(
      accepted.importedTransactionId,
      accepted.recurringTransactionId,
      accepted.recurringInstanceDate,
      signal
    );
    await this.audit.record(
      { match: accepted, action: 'accepted', previousStatus: match.status, performedBy },
      signal
    );
    await this.invalidatePeriods([accepted.recurringInstanceDate.slice(0, 7)]);

    logger.debug(`Match ${matchId} accepted by ${performedBy}`);
    return this.enrichOne(accepted, signal);
  }

  /**
   * @returns The rejected match, or null when the id is unknown
   * @throws InvalidStateTransitionError when the match is already decided
   */
  async rejectMatch(
    matchId: string,
    performedBy = DEFAULT_ACTOR,
    reason?: string,
    signal?: AbortSignal
  ): Promise<MatchDto | null> {
    const match = await this.repositories.matches.getById(matchId, signal);
    if (!match) {
      return null;
    }

    const rejected = rejectTransition(match, this.now());
    await this.persistTransition(rejected, match.status, 'reject', signal);
    await this.audit.record(
      { match: rejected, action: 'rejected', previousStatus: match.status, performedBy, reason },
      signal
    );
    await this.invalidatePeriods([rejected.recurringInstanceDate.slice(0, 7)]);

    logger.debug(`Match ${matchId} rejected by ${performedBy}`);
    return this.enrichOne(rejected, signal);
  }

  /**
   * Stores a decision computed from `previousStatus`. A concurrent decision
   * that already moved the match makes this one an invalid transition.
   */
  private async persistTransition(
    next: ReconciliationMatch,
    previousStatus: MatchStatus,
    action: MatchAction,
    signal?: AbortSignal
  ): Promise<void> {
    if (await this.repositories.matches.update(next, previousStatus, signal)) {
      return;
    }
    const current = await this.repositories.matches.getById(next.id, signal);
    throw new InvalidStateTransitionError(current?.status ?? previousStatus, action);
  }

  /**
   * Accepts each match in turn. Unknown ids and matches that are already
   * decided are skipped and counted as failed.
   */
  async bulkAcceptMatches(
    matchIds: readonly string[],
    performedBy = DEFAULT_ACTOR,
    signal?: AbortSignal
  ): Promise<BulkAcceptResult> {
    const accepted: MatchDto[] = [];
    let failedCount = 0;

    for (const matchId of matchIds) {
      try {
        const result = await this.acceptMatch(matchId, performedBy, signal);
        if (result) {
          accepted.push(result);
        } else {
          failedCount++;
        }
      } catch (error) {
        if (!(error instanceof InvalidStateTransitionError)) {
          throw error;
        }
        logger.warn(`Bulk accept: skipping match ${matchId}: ${error.message}`);
        failedCount++;
      }
    }

    return { accepted, acceptedCount: accepted.length, failedCount };
  }

  /**
   * Pairs a transaction with an instance chosen by the user: full
   * confidence, accepted at once, transaction linked.
   *
   * @returns The new (or already existing) match, or null when the
   *          transaction or recurring transaction is unknown
   */
  async createManualMatch(
    request: ManualMatchRequest,
    performedBy = DEFAULT_ACTOR,
    signal?: AbortSignal
  ): Promise<MatchDto | null> {
    if (!isIsoDate(request.instanceDate)) {
      throw new ValidationError(`Invalid instance date: "${request.instanceDate}"`);
    }

    const transaction = await this.repositories.transactions.getById(request.transactionId, signal);
    if (!transaction) {
      return null;
    }
    const recurring = await this.repositories.recurringTransactions.getById(
      request.recurringTransactionId,
      signal
    );
    if (!recurring) {
      return null;
    }

    const existing = await this.repositories.matches.getByTriple(
      transaction.id,
      recurring.id,
      request.instanceDate,
      signal
    );
    if (existing) {
      return toMatchDto(existing, transaction, recurring);
    }

    const now = this.now();
    const accepted = acceptTransition(
      createReconciliationMatch(
        {
          id: this.generateId(),
          importedTransactionId: transaction.id,
          recurringTransactionId: recurring.id,
          recurringInstanceDate: request.instanceDate,
          confidenceScore: 1,
          source: 'manual',
          amountVariance: recurring.expectedAmount.minus(transaction.amount),
          currency: transaction.currency,
          dateOffsetDays: diffInDays(transaction.date, request.instanceDate),
          scope: recurring.scope,
          ownerUserId: recurring.ownerUserId,
        },
        now
      ),
      now
    );

    if (!(await this.repositories.matches.add(accepted, signal))) {
      const raced = await this.repositories.matches.getByTriple(
        transaction.id,
        recurring.id,
        request.instanceDate,
        signal
      );
      return raced ? toMatchDto(raced, transaction, recurring) : null;
    }

    await this.repositories.transactions.linkToRecurringInstance(
      transaction.id,
      recurring.id,
      request.instanceDate,
      signal
    );
    await this.audit.record(
      { match: accepted, action: 'manual_matched', previousStatus: null, performedBy },
      signal
    );
    await this.invalidatePeriods([request.instanceDate.slice(0, 7)]);

    logger.debug(`Manual match ${accepted.id} created by ${performedBy}`);
    const linked: Transaction = {
      ...transaction,
      linkedRecurringTransactionId: recurring.id,
      linkedInstanceDate: request.instanceDate,
    };
    return toMatchDto(accepted, linked, recurring);
  }

  // ============================================
  // Status report
  // ============================================

  /**
   * Classifies every expected instance of a month as matched, pending or
   * missing. Skipped instances are not expected and are left out.
   */
  async getReconciliationStatus(
    year: number,
    month: number,
    signal?: AbortSignal
  ): Promise<ReconciliationStatusDto> {
    assertValidPeriod(year, month);

    return getStatusWithCache(
      year,
      month,
      () => this.computeStatus(year, month, signal),
      parseCachedStatus
    );
  }

  private async computeStatus(
    year: number,
    month: number,
    signal?: AbortSignal
  ): Promise<ReconciliationStatusDto> {
    const { start, end } = monthBounds(year, month);
    const { instances } = await this.projectActive(start, end, { includeSkipped: true }, signal);
    const periodMatches = await this.repositories.matches.getByPeriod(year, month, signal);

    const matchesByInstance = new Map<string, ReconciliationMatch[]>();
    for (const match of periodMatches) {
      const key = instanceKey(match.recurringTransactionId, match.recurringInstanceDate);
      matchesByInstance.set(key, [...(matchesByInstance.get(key) ?? []), match]);
    }

    const statuses: InstanceStatusDto[] = [];
    for (const instance of instances) {
      if (instance.isSkipped) {
        continue;
      }

      const candidates =
        matchesByInstance.get(instanceKey(instance.recurringTransactionId, instance.instanceDate)) ?? [];
      const matched = candidates.find(
        (match) => match.status === 'accepted' || match.status === 'auto_matched'
      );
      const pending = candidates.find((match) => match.status === 'suggested');

      const base = {
        recurringTransactionId: instance.recurringTransactionId,
        description: instance.description,
        instanceDate: instance.instanceDate,
        expectedAmount: toMoney(instance.expectedAmount, instance.currency),
      };

      if (matched) {
        const transaction = await this.repositories.transactions.getById(
          matched.importedTransactionId,
          signal
        );
        statuses.push({
          ...base,
          status: 'matched',
          matchedTransactionId: matched.importedTransactionId,
          actualAmount: transaction ? toMoney(transaction.amount, transaction.currency) : null,
          amountVariance: matched.amountVariance.toFixed(2),
          matchId: matched.id,
          matchSource: matched.source,
        });
      } else if (pending) {
        statuses.push({
          ...base,
          status: 'pending',
          matchedTransactionId: null,
          actualAmount: null,
          amountVariance: null,
          matchId: pending.id,
          matchSource: pending.source,
        });
      } else {
        statuses.push({
          ...base,
          status: 'missing',
          matchedTransactionId: null,
          actualAmount: null,
          amountVariance: null,
          matchId: null,
          matchSource: null,
        });
      }
    }

    const count = (status: InstanceStatusDto['status']): number =>
      statuses.filter((instance) => instance.status === status).length;

    return {
      year,
      month,
      totalExpectedInstances: statuses.length,
      matchedCount: count('matched'),
      pendingCount: count('pending'),
      missingCount: count('missing'),
      instances: statuses,
    };
  }

  // ============================================
  // Linkable instances
  // ============================================

  /**
   * Instances within ±15 days of a transaction that a user could link it
   * to manually.
   *
   * @returns null when the transaction is unknown
   */
  async getLinkableInstances(
    transactionId: string,
    signal?: AbortSignal
  ): Promise<LinkableInstanceDto[] | null> {
    const transaction = await this.repositories.transactions.getById(transactionId, signal);
    if (!transaction) {
      return null;
    }

    const start = addDays(transaction.date, -LINKABLE_WINDOW_DAYS);
    const end = addDays(transaction.date, LINKABLE_WINDOW_DAYS);
    const { instances } = await this.projectActive(start, end, {}, signal);

    const matchedInstances = new Set<string>();
    for (const recurringId of new Set(instances.map((instance) => instance.recurringTransactionId))) {
      const matches = await this.repositories.matches.getByRecurringTransaction(
        recurringId,
        start,
        end,
        signal
      );
      for (const match of matches) {
        if (match.status !== 'rejected') {
          matchedInstances.add(instanceKey(match.recurringTransactionId, match.recurringInstanceDate));
        }
      }
    }

    return instances.map((instance) => ({
      recurringTransactionId: instance.recurringTransactionId,
      description: instance.description,
      expectedAmount: toMoney(instance.expectedAmount, instance.currency),
      instanceDate: instance.instanceDate,
      isAlreadyMatched: matchedInstances.has(
        instanceKey(instance.recurringTransactionId, instance.instanceDate)
      ),
      suggestedConfidence: scoreTransaction(transaction, [instance])[0]?.confidenceScore ?? null,
    }));
  }

  // ============================================
  // Internals
  // ============================================

  private async projectActive(
    start: IsoDate,
    end: IsoDate,
    options: ProjectionOptions,
    signal?: AbortSignal
  ): Promise<{
    recurringById: Map<string, RecurringTransaction>;
    instances: RecurringScheduleInstance[];
  }> {
    const recurring = await this.repositories.recurringTransactions.getActive(signal);
    const exceptions = await this.repositories.recurringTransactions.getExceptionsInRange(
      recurring.map((item) => item.id),
      start,
      end,
      signal
    );

    return {
      recurringById: new Map(recurring.map((item) => [item.id, item])),
      instances: flattenInstances(projectInstances(recurring, exceptions, start, end, options)),
    };
  }

  private async enrichOne(match: ReconciliationMatch, signal?: AbortSignal): Promise<MatchDto> {
    const transaction = await this.repositories.transactions.getById(
      match.importedTransactionId,
      signal
    );
    const recurring = await this.repositories.recurringTransactions.getById(
      match.recurringTransactionId,
      signal
    );
    return toMatchDto(match, transaction, recurring);
  }

  private async enrich(
    matches: readonly ReconciliationMatch[],
    signal?: AbortSignal
  ): Promise<MatchDto[]> {
    const dtos: MatchDto[] = [];
    for (const match of matches) {
      dtos.push(await this.enrichOne(match, signal));
    }
    return dtos;
  }

  /**
   * @param periods - "YYYY-MM" keys
   */
  private async invalidatePeriods(periods: Iterable<string>): Promise<void> {
    for (const period of periods) {
      const { year, month } = parseIsoDate(`${period}-01`);
      await invalidateStatusCache(year, month);
    }
  }
}
