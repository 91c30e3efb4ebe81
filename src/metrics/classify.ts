/**
 * Subscription classification.
 * PURE FUNCTIONS: no side effects, deterministic output.
 *
 * Day boundaries are taken in the merchant's time zone. A period covers
 * start-of-day of its first date through end-of-day of its last date,
 * both inclusive.
 */

import { addCalendarDays, startOfDay } from '../time/period.js';
import type { CalendarDate, Subscription } from '../types.js';

function dayStartSeconds(date: CalendarDate, timeZone: string): number {
  return Math.floor(startOfDay(date, timeZone).getTime() / 1000);
}

/**
 * True when the instant lies in [start-of-day(from), end-of-day(to)].
 */
function isWithinDays(
  timestamp: number,
  from: CalendarDate,
  to: CalendarDate,
  timeZone: string
): boolean {
  const lower = dayStartSeconds(from, timeZone);
  const upper = dayStartSeconds(addCalendarDays(to, 1), timeZone);
  return timestamp >= lower && timestamp < upper;
}

/**
 * Existed before `date` began and had not ended by then.
 * A subscription created on `date` itself is new that day, not active at its start.
 */
export function isActiveAtStart(
  subscription: Subscription,
  date: CalendarDate,
  timeZone: string
): boolean {
  const boundary = dayStartSeconds(date, timeZone);
  return (
    subscription.createdAt < boundary &&
    (subscription.deactivatedAt === null || subscription.deactivatedAt >= boundary)
  );
}

export function isNewDuring(
  subscription: Subscription,
  from: CalendarDate,
  to: CalendarDate,
  timeZone: string
): boolean {
  return isWithinDays(subscription.createdAt, from, to, timeZone);
}

export function isChurnedDuring(
  subscription: Subscription,
  from: CalendarDate,
  to: CalendarDate,
  timeZone: string
): boolean {
  return (
    subscription.deactivatedAt !== null &&
    isWithinDays(subscription.deactivatedAt, from, to, timeZone)
  );
}

/**
 * Normalize a subscription's recurring price to monthly cents.
 * E.g., $120/year → $10/month; $30/quarter → $10/month.
 * Unknown recurrence units contribute nothing.
 */
export function monthlyRecurringRevenueCents(subscription: Subscription): number {
  const cents = subscription.recurringPriceCents;
  switch (subscription.recurrenceUnit) {
    case 'monthly':   return cents;
    case 'quarterly': return Math.round(cents / 3);
    case 'yearly':    return Math.round(cents / 12);
    default:          return 0;
  }
}
