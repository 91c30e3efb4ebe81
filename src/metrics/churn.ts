/**
 * Period-level churn aggregation.
 * Pure function - no API calls, only computation.
 *
 * Churn rate follows Stripe's formula:
 *   churned / (active at start + new during period) × 100
 * The base counts everyone who could have churned during the window,
 * not just the customers who were there on day one.
 */

import {
  isActiveAtStart,
  isChurnedDuring,
  isNewDuring,
  monthlyRecurringRevenueCents,
} from './classify.js';
import type { ChurnCounts, Period, PeriodSummary, Subscription } from '../types.js';

export function roundToHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Customer churn rate as a 0-100 percentage with 2 decimals.
 * An empty base is 0% churn.
 */
export function customerChurnRate(counts: ChurnCounts): number {
  const totalBase = counts.activeAtStart + counts.newSubscribers;
  if (totalBase === 0) {
    return 0;
  }
  return roundToHundredths((counts.churnedSubscribers / totalBase) * 100);
}

/**
 * Classify every subscription against the whole period in one pass.
 *
 * @param subscriptions - Candidate subscriptions (any superset of those overlapping the period)
 * @param period - Calendar period in the merchant's zone
 * @param timeZone - IANA zone that anchors day boundaries
 */
export function summarizePeriod(
  subscriptions: Subscription[],
  period: Period,
  timeZone: string
): PeriodSummary {
  let activeAtStart = 0;
  let newSubscribers = 0;
  let churnedSubscribers = 0;
  let churnedMrrCents = 0;

  for (const subscription of subscriptions) {
    if (isActiveAtStart(subscription, period.startDate, timeZone)) {
      activeAtStart++;
    }
    if (isNewDuring(subscription, period.startDate, period.endDate, timeZone)) {
      newSubscribers++;
    }
    if (isChurnedDuring(subscription, period.startDate, period.endDate, timeZone)) {
      churnedSubscribers++;
      churnedMrrCents += monthlyRecurringRevenueCents(subscription);
    }
  }

  const counts = { activeAtStart, newSubscribers, churnedSubscribers };
  return {
    ...counts,
    churnedMrrCents,
    totalBase: activeAtStart + newSubscribers,
    customerChurnRate: customerChurnRate(counts),
  };
}
