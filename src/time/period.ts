/**
 * Date and time zone normalization.
 * Turns request input into a calendar period anchored to the merchant's zone.
 */

import {
  addDays,
  differenceInCalendarDays,
  format,
  getMonth,
  getYear,
  isValid,
  parseISO,
  subMonths,
} from 'date-fns';
import { formatInTimeZone, fromZonedTime, getTimezoneOffset } from 'date-fns-tz';

import { InvalidDateFormatError, InvalidDateRangeError } from '../errors.js';
import type { CalendarDate, DateParams, Period } from '../types.js';

const CALENDAR_FORMAT = 'yyyy-MM-dd';
const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}(?:$|T)/;

export const DEFAULT_PERIOD_MONTHS = 1;

/**
 * Parse a raw date parameter into a calendar date.
 * Accepts `2023-12-01` or an ISO date-time, whose calendar part is kept as written.
 *
 * @throws InvalidDateFormatError if the value is not an ISO date
 */
export function parseCalendarDate(value: string): CalendarDate {
  const trimmed = value.trim();
  if (!ISO_DATE_PREFIX.test(trimmed) || !isValid(parseISO(trimmed))) {
    throw new InvalidDateFormatError(value);
  }
  return trimmed.slice(0, 10);
}

export function addCalendarDays(date: CalendarDate, days: number): CalendarDate {
  return format(addDays(parseISO(date), days), CALENDAR_FORMAT);
}

/** The calendar date it currently is in `timeZone`. */
export function todayIn(timeZone: string, now: Date): CalendarDate {
  return formatInTimeZone(now, timeZone, CALENDAR_FORMAT);
}

/**
 * The instant `date` begins in `timeZone`: the first instant whose local date is `date`.
 * Where clocks jump forward at midnight the day begins at the end of the gap.
 */
export function startOfDay(date: CalendarDate, timeZone: string): Date {
  const midnight = fromZonedTime(`${date}T00:00:00`, timeZone);
  if (formatInTimeZone(midnight, timeZone, CALENDAR_FORMAT) >= date) {
    return midnight;
  }
  // Skipped midnight resolves to the previous day; apply the offset in force before the jump
  return new Date(Date.parse(`${date}T00:00:00Z`) - getTimezoneOffset(timeZone, midnight));
}

/** The calendar date a unix timestamp falls on in `timeZone`. */
export function localDate(timestamp: number, timeZone: string): CalendarDate {
  return formatInTimeZone(new Date(timestamp * 1000), timeZone, CALENDAR_FORMAT);
}

export interface PeriodInput {
  startDate?: CalendarDate;
  endDate?: CalendarDate;
  params?: DateParams;
  now: Date;
  timeZone: string;
}

/**
 * Resolve the requested period. Explicit dates win over raw params, and
 * `start_time`/`end_time` win over `from`/`to`.
 *
 * Defaults: end = today in the merchant's zone, start = end minus one month.
 * The range itself is NOT validated here; see isValidPeriod / assertValidPeriod.
 */
export function resolvePeriod(input: PeriodInput): Period {
  const params = input.params ?? {};

  const rawEnd = input.endDate ?? params.end_time ?? params.to;
  const endDate = rawEnd !== undefined
    ? parseCalendarDate(rawEnd)
    : todayIn(input.timeZone, input.now);

  const rawStart = input.startDate ?? params.start_time ?? params.from;
  const startDate = rawStart !== undefined
    ? parseCalendarDate(rawStart)
    : format(subMonths(parseISO(endDate), DEFAULT_PERIOD_MONTHS), CALENDAR_FORMAT);

  return { startDate, endDate };
}

export function isValidPeriod(period: Period): boolean {
  return period.endDate >= period.startDate;
}

/**
 * @throws InvalidDateRangeError if the end date precedes the start date
 */
export function assertValidPeriod(period: Period): void {
  if (!isValidPeriod(period)) {
    throw new InvalidDateRangeError(period.startDate, period.endDate);
  }
}

/** Inclusive number of days in the period. */
export function timeWindow(period: Period): number {
  return differenceInCalendarDays(parseISO(period.endDate), parseISO(period.startDate)) + 1;
}

/** The period of equal length ending the day before `period` starts. */
export function previousPeriod(period: Period): Period {
  const endDate = addCalendarDays(period.startDate, -1);
  return {
    startDate: addCalendarDays(endDate, -(timeWindow(period) - 1)),
    endDate,
  };
}

export function eachDay(period: Period): CalendarDate[] {
  const days: CalendarDate[] = [];
  for (let date = period.startDate; date <= period.endDate; date = addCalendarDays(date, 1)) {
    days.push(date);
  }
  return days;
}

/** Human month label, e.g. "December 2023". */
export function monthLabel(date: CalendarDate): string {
  return format(parseISO(date), 'MMMM yyyy');
}

/** Months elapsed between `startDate`'s month and `date`'s month. */
export function monthIndex(date: CalendarDate, startDate: CalendarDate): number {
  const day = parseISO(date);
  const start = parseISO(startDate);
  return (getYear(day) - getYear(start)) * 12 + (getMonth(day) - getMonth(start));
}
