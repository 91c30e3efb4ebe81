/**
 * Daily churn series.
 *
 * Each day's rate is computed against a running active balance carried from
 * the first day of the period:
 *   base[d]       = active[d] + new[d]
 *   active[d + 1] = active[d] + new[d] - churned[d]
 * Period totals are folded from the same buckets, so the daily series and the
 * period metrics always reconcile.
 */

import { customerChurnRate } from './churn.js';
import { monthIndex, monthLabel } from '../time/period.js';
import type {
  CalendarDate,
  DailyBucket,
  DailyChurnEntry,
  DayCounts,
  PeriodSummary,
  RawDailyCounts,
} from '../types.js';

/**
 * Attach each day's point-in-time active count to a data source's raw counts.
 * New and churned on the same day are applied independently, never netted.
 */
export function withRunningActive(raw: RawDailyCounts): DayCounts[] {
  let runningActive = raw.activeAtStart;
  return raw.days.map((day) => {
    const counts: DayCounts = { ...day, activeAtStart: runningActive };
    runningActive = runningActive + day.newSubscribers - day.churnedSubscribers;
    return counts;
  });
}

/**
 * Build one bucket per day. Days must be chronological and contiguous; only
 * the first day's active count seeds the balance, later ones are derived.
 */
export function buildDailySeries(days: DayCounts[]): DailyBucket[] {
  if (days.length === 0) {
    return [];
  }

  let runningActive = days[0].activeAtStart;
  return days.map((day) => {
    const bucket: DailyBucket = {
      date: day.date,
      activeAtStart: runningActive,
      newSubscribers: day.newSubscribers,
      churnedSubscribers: day.churnedSubscribers,
      churnedMrrCents: day.churnedMrrCents,
      customerChurnRate: customerChurnRate({
        activeAtStart: runningActive,
        newSubscribers: day.newSubscribers,
        churnedSubscribers: day.churnedSubscribers,
      }),
    };
    runningActive = runningActive + day.newSubscribers - day.churnedSubscribers;
    return bucket;
  });
}

/**
 * Fold a daily series into period totals.
 * Active at start is the first day's; everything else is a sum over days.
 */
export function summarizeDailySeries(buckets: DailyBucket[]): PeriodSummary {
  const activeAtStart = buckets.length > 0 ? buckets[0].activeAtStart : 0;
  let newSubscribers = 0;
  let churnedSubscribers = 0;
  let churnedMrrCents = 0;

  for (const bucket of buckets) {
    newSubscribers += bucket.newSubscribers;
    churnedSubscribers += bucket.churnedSubscribers;
    churnedMrrCents += bucket.churnedMrrCents;
  }

  const counts = { activeAtStart, newSubscribers, churnedSubscribers };
  return {
    ...counts,
    churnedMrrCents,
    totalBase: activeAtStart + newSubscribers,
    customerChurnRate: customerChurnRate(counts),
  };
}

export function toDailyEntries(buckets: DailyBucket[], startDate: CalendarDate): DailyChurnEntry[] {
  return buckets.map((bucket) => ({
    date: bucket.date,
    month: monthLabel(bucket.date),
    month_index: monthIndex(bucket.date, startDate),
    customer_churn_rate: bucket.customerChurnRate,
    churned_subscribers: bucket.churnedSubscribers,
    churned_mrr_cents: bucket.churnedMrrCents,
    active_at_start: bucket.activeAtStart,
    new_subscribers: bucket.newSubscribers,
  }));
}
