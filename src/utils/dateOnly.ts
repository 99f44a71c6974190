/**
 * Calendar-date helpers on ISO `YYYY-MM-DD` strings.
 *
 * All arithmetic goes through UTC day numbers (days since 1970-01-01), so
 * results never depend on the host time zone.
 */

import { ValidationError } from './AppError';

export type IsoDate = string;

export interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

export function parseIsoDate(value: IsoDate): DateParts {
  if (!isIsoDate(value)) {
    throw new ValidationError(`Invalid date: "${value}" (expected YYYY-MM-DD)`);
  }

  const [year, month, day] = value.split('-').map(Number);
  return { year, month, day };
}

export function formatIsoDate({ year, month, day }: DateParts): IsoDate {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function toDayNumber(value: IsoDate): number {
  const { year, month, day } = parseIsoDate(value);
  return Math.round(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}

export function fromDayNumber(dayNumber: number): IsoDate {
  const date = new Date(dayNumber * MS_PER_DAY);
  return formatIsoDate({
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  });
}

export function addDays(value: IsoDate, days: number): IsoDate {
  return fromDayNumber(toDayNumber(value) + days);
}

/**
 * Signed difference `later - earlier` in days.
 */
export function diffInDays(later: IsoDate, earlier: IsoDate): number {
  return toDayNumber(later) - toDayNumber(earlier);
}

/**
 * 0 = Sunday … 6 = Saturday
 */
export function dayOfWeek(value: IsoDate): number {
  // 1970-01-01 was a Thursday
  return (((toDayNumber(value) + 4) % 7) + 7) % 7;
}

/**
 * Zero-based month index used for month arithmetic: year * 12 + (month - 1).
 */
export function monthIndex(year: number, month: number): number {
  return year * 12 + (month - 1);
}

/**
 * Date in the month `index`, with the day clamped to that month's length.
 */
export function dateInMonth(index: number, dayOfMonth: number): IsoDate {
  const year = Math.floor(index / 12);
  const month = (index % 12) + 1;
  return formatIsoDate({ year, month, day: Math.min(dayOfMonth, daysInMonth(year, month)) });
}

/**
 * Same day-of-month `months` later (or earlier), clamped to the target month.
 *
 * @example
 * addMonths('2024-02-29', 12) // '2025-02-28'
 */
export function addMonths(value: IsoDate, months: number): IsoDate {
  const { year, month, day } = parseIsoDate(value);
  return dateInMonth(monthIndex(year, month) + months, day);
}

export function monthBounds(year: number, month: number): { start: IsoDate; end: IsoDate } {
  return {
    start: formatIsoDate({ year, month, day: 1 }),
    end: formatIsoDate({ year, month, day: daysInMonth(year, month) }),
  };
}

/**
 * Fails with a ValidationError when `start` lies after `end`.
 */
export function assertValidRange(start: IsoDate, end: IsoDate): void {
  if (toDayNumber(start) > toDayNumber(end)) {
    throw ValidationError.invalidRange(start, end);
  }
}

export function todayUtc(now: Date = new Date()): IsoDate {
  return formatIsoDate({
    year: now.getUTCFullYear(),
    month: now.getUTCMonth() + 1,
    day: now.getUTCDate(),
  });
}
