/**
 * Recurring Instance Projector
 *
 * Expands recurring transactions into dated expected instances within a
 * closed range and applies per-date exceptions:
 * - skip: the date disappears (or is flagged, with `includeSkipped`)
 * - modify: amount and/or description are replaced, the date stays
 *
 * Pure and synchronous. Output depends only on the arguments.
 */

import { assertValidRange, type IsoDate } from '../utils/dateOnly';
import { enumerateOccurrences } from './occurrences';
import type {
  ProjectedInstances,
  ProjectionOptions,
  RecurringScheduleInstance,
  RecurringTransaction,
  RecurringTransactionException,
} from './types';

const exceptionKey = (recurringTransactionId: string, date: IsoDate): string =>
  `${recurringTransactionId}|${date}`;

/**
 * Indexes exceptions by (recurring transaction, date). When both a skip and
 * a modify exist for the same occurrence, the skip wins.
 */
function indexExceptions(
  exceptions: readonly RecurringTransactionException[]
): Map<string, RecurringTransactionException> {
  const index = new Map<string, RecurringTransactionException>();

  for (const exception of exceptions) {
    const key = exceptionKey(exception.recurringTransactionId, exception.originalDate);
    const existing = index.get(key);
    if (!existing || exception.type === 'skip') {
      index.set(key, exception);
    }
  }

  return index;
}

function buildInstance(
  recurring: RecurringTransaction,
  instanceDate: IsoDate,
  exception: RecurringTransactionException | undefined
): RecurringScheduleInstance {
  const isSkipped = exception?.type === 'skip';
  const modification = exception?.type === 'modify' ? exception : undefined;

  return Object.freeze({
    recurringTransactionId: recurring.id,
    instanceDate,
    expectedAmount: modification?.modifiedAmount ?? recurring.expectedAmount,
    currency: recurring.currency,
    description: modification?.modifiedDescription ?? recurring.description,
    isSkipped,
    isModified: modification !== undefined,
  });
}

/**
 * Projects the instances of one recurring transaction, in date order.
 * Inactive recurring transactions produce nothing.
 */
export function projectRecurringTransaction(
  recurring: RecurringTransaction,
  exceptions: readonly RecurringTransactionException[],
  start: IsoDate,
  end: IsoDate,
  options: ProjectionOptions = {}
): RecurringScheduleInstance[] {
  assertValidRange(start, end);

  if (!recurring.isActive) {
    return [];
  }

  const exceptionIndex = indexExceptions(
    exceptions.filter((exception) => exception.recurringTransactionId === recurring.id)
  );

  return enumerateOccurrences(recurring.pattern, recurring.startDate, recurring.endDate, start, end)
    .map((date) => buildInstance(recurring, date, exceptionIndex.get(exceptionKey(recurring.id, date))))
    .filter((instance) => options.includeSkipped === true || !instance.isSkipped);
}

/**
 * Projects every recurring transaction over `[start, end]`.
 *
 * @returns Instances grouped by date, dates ascending; within a date,
 *          ordered by recurring transaction id
 * @throws ValidationError when `start` is after `end`
 *
 * @example
 * const byDate = projectInstances([netflix, rent], [], '2026-01-01', '2026-01-31');
 * byDate.get('2026-01-15'); // [netflix instance]
 */
export function projectInstances(
  recurringTransactions: readonly RecurringTransaction[],
  exceptions: readonly RecurringTransactionException[],
  start: IsoDate,
  end: IsoDate,
  options: ProjectionOptions = {}
): ProjectedInstances {
  assertValidRange(start, end);

  const instances: RecurringScheduleInstance[] = [];
  for (const recurring of recurringTransactions) {
    instances.push(...projectRecurringTransaction(recurring, exceptions, start, end, options));
  }

  // ISO dates sort lexicographically
  instances.sort((a, b) => {
    if (a.instanceDate !== b.instanceDate) return a.instanceDate < b.instanceDate ? -1 : 1;
    if (a.recurringTransactionId === b.recurringTransactionId) return 0;
    return a.recurringTransactionId < b.recurringTransactionId ? -1 : 1;
  });

  const byDate: ProjectedInstances = new Map();
  for (const instance of instances) {
    const sameDay = byDate.get(instance.instanceDate);
    if (sameDay) {
      sameDay.push(instance);
    } else {
      byDate.set(instance.instanceDate, [instance]);
    }
  }

  return byDate;
}

export function flattenInstances(projected: ProjectedInstances): RecurringScheduleInstance[] {
  return [...projected.values()].flat();
}
