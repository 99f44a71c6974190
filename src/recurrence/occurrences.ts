/**
 * Occurrence enumeration for recurrence patterns.
 *
 * Every series is anchored on the recurring transaction's start date. The
 * enumerator jumps arithmetically to the first occurrence at or after the
 * window start, so the work done is proportional to the occurrences
 * returned, never to the length of the series.
 */

import {
  assertValidRange,
  dateInMonth,
  dayOfWeek,
  fromDayNumber,
  monthIndex,
  parseIsoDate,
  toDayNumber,
  type IsoDate,
} from '../utils/dateOnly';
import type { RecurrencePattern } from './types';

interface DayStep {
  kind: 'days';
  /** Day number of the first occurrence */
  anchor: number;
  step: number;
}

interface MonthStep {
  kind: 'months';
  /** Month index of the first candidate month */
  anchor: number;
  step: number;
  dayOfMonth: number;
}

type Cadence = DayStep | MonthStep;

function cadenceFor(pattern: RecurrencePattern, seriesStart: IsoDate): Cadence {
  const startDay = toDayNumber(seriesStart);
  const { year, month } = parseIsoDate(seriesStart);
  const firstWeekday = (weekday: number): number =>
    startDay + ((weekday - dayOfWeek(seriesStart) + 7) % 7);

  switch (pattern.frequency) {
    case 'daily':
      return { kind: 'days', anchor: startDay, step: pattern.interval };
    case 'weekly':
      return { kind: 'days', anchor: firstWeekday(pattern.dayOfWeek), step: 7 * pattern.interval };
    case 'biweekly':
      return { kind: 'days', anchor: firstWeekday(pattern.dayOfWeek), step: 14 };
    case 'monthly':
      return {
        kind: 'months',
        anchor: monthIndex(year, month),
        step: pattern.interval,
        dayOfMonth: pattern.dayOfMonth,
      };
    case 'quarterly':
      return { kind: 'months', anchor: monthIndex(year, month), step: 3, dayOfMonth: pattern.dayOfMonth };
    case 'yearly': {
      const anchor = monthIndex(year, pattern.monthOfYear);
      return {
        kind: 'months',
        anchor: anchor < monthIndex(year, month) ? anchor + 12 : anchor,
        step: 12,
        dayOfMonth: pattern.dayOfMonth,
      };
    }
  }
}

function enumerateDaySteps(cadence: DayStep, firstDay: number, lastDay: number): IsoDate[] {
  const dates: IsoDate[] = [];
  const skipped = firstDay > cadence.anchor ? Math.ceil((firstDay - cadence.anchor) / cadence.step) : 0;

  for (let day = cadence.anchor + skipped * cadence.step; day <= lastDay; day += cadence.step) {
    dates.push(fromDayNumber(day));
  }

  return dates;
}

function enumerateMonthSteps(cadence: MonthStep, firstDay: number, lastDay: number): IsoDate[] {
  const dates: IsoDate[] = [];
  const first = parseIsoDate(fromDayNumber(firstDay));
  const last = parseIsoDate(fromDayNumber(lastDay));
  const firstMonth = monthIndex(first.year, first.month);
  const lastMonth = monthIndex(last.year, last.month);
  const skipped =
    firstMonth > cadence.anchor ? Math.floor((firstMonth - cadence.anchor) / cadence.step) : 0;

  for (let index = cadence.anchor + skipped * cadence.step; index <= lastMonth; index += cadence.step) {
    const date = dateInMonth(index, cadence.dayOfMonth);
    const day = toDayNumber(date);
    if (day >= firstDay && day <= lastDay) {
      dates.push(date);
    }
  }

  return dates;
}

/**
 * Occurrence dates of a series within `[from, to]`, ascending and distinct.
 *
 * @param seriesStart - First day the series may produce an occurrence
 * @param seriesEnd - Last day, or null for an open-ended series
 * @throws ValidationError when `from` is after `to`
 *
 * @example
 * enumerateOccurrences({ frequency: 'monthly', interval: 1, dayOfMonth: 31 }, '2026-01-01', null, '2026-01-01', '2026-03-31')
 * // ['2026-01-31', '2026-02-28', '2026-03-31']
 */
export function enumerateOccurrences(
  pattern: RecurrencePattern,
  seriesStart: IsoDate,
  seriesEnd: IsoDate | null,
  from: IsoDate,
  to: IsoDate
): IsoDate[] {
  assertValidRange(from, to);

  const firstDay = Math.max(toDayNumber(from), toDayNumber(seriesStart));
  const lastDay = seriesEnd === null ? toDayNumber(to) : Math.min(toDayNumber(to), toDayNumber(seriesEnd));
  if (firstDay > lastDay) {
    return [];
  }

  const cadence = cadenceFor(pattern, seriesStart);
  return cadence.kind === 'days'
    ? enumerateDaySteps(cadence, firstDay, lastDay)
    : enumerateMonthSteps(cadence, firstDay, lastDay);
}
