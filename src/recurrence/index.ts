/**
 * Recurrence: patterns, occurrence enumeration and instance projection.
 */

export { projectInstances, projectRecurringTransaction, flattenInstances } from './instanceProjector';
export { enumerateOccurrences } from './occurrences';
export {
  RecurrencePatterns,
  describePattern,
  parseRecurrencePattern,
  recurrencePatternSchema,
} from './recurrencePattern';

export type {
  RecurrenceFrequency,
  RecurrencePattern,
  OwnershipScope,
  RecurringTransaction,
  RecurringTransactionException,
  ExceptionType,
  RecurringScheduleInstance,
  ProjectionOptions,
  ProjectedInstances,
} from './types';
