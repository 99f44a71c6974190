/**
 * ReconciliationMatch state machine
 *
 *   suggested ──autoMatch──▶ auto_matched
 *       │                        │
 *       ├──accept──▶ accepted ◀──┤
 *       └──reject──▶ rejected ◀──┘
 *
 * Every transition is a pure function returning a new frozen match, or
 * throwing InvalidStateTransitionError. Persisting the result is the
 * caller's job.
 */

import { InvalidStateTransitionError, ValidationError } from '../utils/AppError';
import { isIsoDate } from '../utils/dateOnly';
import { determineConfidenceLevel } from '../matching/confidenceCalculator';
import type {
  CreateReconciliationMatchInput,
  MatchAction,
  MatchStatus,
  ReconciliationMatch,
} from './types';

const TRANSITIONS: Record<MatchAction, readonly MatchStatus[]> = {
  'auto-match': ['suggested'],
  accept: ['suggested', 'auto_matched'],
  reject: ['suggested', 'auto_matched'],
};

export function isTerminal(status: MatchStatus): boolean {
  return status === 'accepted' || status === 'rejected';
}

export function canTransition(status: MatchStatus, action: MatchAction): boolean {
  return TRANSITIONS[action].includes(status);
}

/**
 * Creates a fresh `suggested` match.
 *
 * @throws ValidationError on missing ids, a malformed date, a score outside
 *         [0, 1] or a personal match without an owner
 */
export function createReconciliationMatch(
  input: CreateReconciliationMatchInput,
  now: Date = new Date()
): ReconciliationMatch {
  const missing = (['id', 'importedTransactionId', 'recurringTransactionId'] as const).filter(
    (field) => input[field].trim().length === 0
  );
  if (missing.length > 0) {
    throw new ValidationError(`Missing required field(s): ${missing.join(', ')}`);
  }
  if (!isIsoDate(input.recurringInstanceDate)) {
    throw new ValidationError(`Invalid instance date: "${input.recurringInstanceDate}"`);
  }
  if (
    !Number.isFinite(input.confidenceScore) ||
    input.confidenceScore < 0 ||
    input.confidenceScore > 1
  ) {
    throw new ValidationError(
      `Confidence score must be between 0 and 1 (got ${input.confidenceScore})`
    );
  }
  if (input.scope === 'personal' && !input.ownerUserId) {
    throw new ValidationError('A personal match requires an owner');
  }

  const match: ReconciliationMatch = {
    ...input,
    confidenceLevel: determineConfidenceLevel(input.confidenceScore),
    status: 'suggested',
    createdAtUtc: now.toISOString(),
    resolvedAtUtc: null,
  };

  return Object.freeze(match);
}

function transition(
  match: ReconciliationMatch,
  action: MatchAction,
  changes: Pick<ReconciliationMatch, 'status' | 'resolvedAtUtc'>
): ReconciliationMatch {
  if (!canTransition(match.status, action)) {
    throw new InvalidStateTransitionError(match.status, action);
  }

  return Object.freeze({ ...match, ...changes });
}

/**
 * Marks a freshly created match as auto-matched. Only valid before any
 * decision has been recorded.
 */
export function autoMatch(match: ReconciliationMatch): ReconciliationMatch {
  if (match.resolvedAtUtc !== null) {
    throw new InvalidStateTransitionError(match.status, 'auto-match');
  }

  return transition(match, 'auto-match', { status: 'auto_matched', resolvedAtUtc: null });
}

export function acceptMatch(match: ReconciliationMatch, now: Date = new Date()): ReconciliationMatch {
  return transition(match, 'accept', { status: 'accepted', resolvedAtUtc: now.toISOString() });
}

export function rejectMatch(match: ReconciliationMatch, now: Date = new Date()): ReconciliationMatch {
  return transition(match, 'reject', { status: 'rejected', resolvedAtUtc: now.toISOString() });
}
