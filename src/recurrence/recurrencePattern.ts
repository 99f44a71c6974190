/**
 * Recurrence patterns: factories, validation and display labels.
 */

import { z } from 'zod';
import { ValidationError } from '../utils/AppError';
import type {
  BiweeklyPattern,
  DailyPattern,
  MonthlyPattern,
  QuarterlyPattern,
  RecurrencePattern,
  WeeklyPattern,
  YearlyPattern,
} from './types';

const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const interval = z.number().int().min(1, 'interval must be at least 1');
const dayOfWeek = z.number().int().min(0).max(6);
const dayOfMonth = z.number().int().min(1).max(31);

export const recurrencePatternSchema = z.discriminatedUnion('frequency', [
  z.object({ frequency: z.literal('daily'), interval }),
  z.object({ frequency: z.literal('weekly'), interval, dayOfWeek }),
  z.object({ frequency: z.literal('biweekly'), dayOfWeek }),
  z.object({ frequency: z.literal('monthly'), interval, dayOfMonth }),
  z.object({ frequency: z.literal('quarterly'), dayOfMonth }),
  z.object({
    frequency: z.literal('yearly'),
    monthOfYear: z.number().int().min(1).max(12),
    dayOfMonth,
  }),
]);

/**
 * Validates an untrusted value (request body, stored JSON) as a pattern.
 *
 * @throws ValidationError listing every offending field
 */
export function parseRecurrencePattern(value: unknown): RecurrencePattern {
  const result = recurrencePatternSchema.safeParse(value);

  if (!result.success) {
    const problems = result.error.errors
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
      .join('; ');
    throw new ValidationError(`Invalid recurrence pattern: ${problems}`);
  }

  return result.data;
}

const validated = <T extends RecurrencePattern>(pattern: T): T => {
  parseRecurrencePattern(pattern);
  return pattern;
};

/**
 * Validating factories.
 *
 * @example
 * RecurrencePatterns.monthly(15) // monthly on the 15th
 * RecurrencePatterns.weekly(5, 2) // every other Friday
 */
export const RecurrencePatterns = {
  daily: (everyDays = 1): DailyPattern => validated({ frequency: 'daily', interval: everyDays }),

  weekly: (weekday: number, everyWeeks = 1): WeeklyPattern =>
    validated({ frequency: 'weekly', interval: everyWeeks, dayOfWeek: weekday }),

  biweekly: (weekday: number): BiweeklyPattern =>
    validated({ frequency: 'biweekly', dayOfWeek: weekday }),

  monthly: (day: number, everyMonths = 1): MonthlyPattern =>
    validated({ frequency: 'monthly', interval: everyMonths, dayOfMonth: day }),

  quarterly: (day: number): QuarterlyPattern =>
    validated({ frequency: 'quarterly', dayOfMonth: day }),

  yearly: (month: number, day: number): YearlyPattern =>
    validated({ frequency: 'yearly', monthOfYear: month, dayOfMonth: day }),
};

const plural = (count: number, unit: string): string => `${count} ${unit}${count === 1 ? '' : 's'}`;

/**
 * @example
 * describePattern({ frequency: 'monthly', interval: 1, dayOfMonth: 15 }) // "Monthly on day 15"
 * describePattern({ frequency: 'biweekly', dayOfWeek: 5 }) // "Every 2 weeks on Friday"
 */
export function describePattern(pattern: RecurrencePattern): string {
  switch (pattern.frequency) {
    case 'daily':
      return pattern.interval === 1 ? 'Daily' : `Every ${plural(pattern.interval, 'day')}`;
    case 'weekly':
      return pattern.interval === 1
        ? `Weekly on ${WEEKDAY_NAMES[pattern.dayOfWeek]}`
        : `Every ${plural(pattern.interval, 'week')} on ${WEEKDAY_NAMES[pattern.dayOfWeek]}`;
    case 'biweekly':
      return `Every 2 weeks on ${WEEKDAY_NAMES[pattern.dayOfWeek]}`;
    case 'monthly':
      return pattern.interval === 1
        ? `Monthly on day ${pattern.dayOfMonth}`
        : `Every ${plural(pattern.interval, 'month')} on day ${pattern.dayOfMonth}`;
    case 'quarterly':
      return `Quarterly on day ${pattern.dayOfMonth}`;
    case 'yearly':
      return `Yearly on ${MONTH_NAMES[pattern.monthOfYear - 1]} ${pattern.dayOfMonth}`;
  }
}
