/**
 * Per-day read-through cache for churn counts.
 *
 * Days up to two days before "today" (in the merchant's zone) are read from
 * and written to the store; today and yesterday are always computed live.
 * Each entry holds one day's counts and its point-in-time active count.
 * Churn rates are not stored; they are recomputed on every read.
 */

import { z } from 'zod';

import { addCalendarDays, eachDay } from '../time/period.js';
import type { CalendarDate, DayCounts, Period } from '../types.js';
import type { CacheStore, CacheVersion } from './store.js';

/** Days newer than today minus this many days are never cached. */
export const FRESHNESS_HORIZON_DAYS = 2;

export interface DailyCacheScope {
  accountId: string;
  timeZone: string;
  productIds: string[];
}

export type DayCountsLoader = (period: Period) => Promise<DayCounts[]>;

const cachedDaySchema = z.object({
  date: z.string(),
  activeAtStart: z.number().int(),
  newSubscribers: z.number().int().nonnegative(),
  churnedSubscribers: z.number().int().nonnegative(),
  churnedMrrCents: z.number().int().nonnegative(),
});

export function dailyCacheKey(scope: DailyCacheScope, version: number, date: CalendarDate): string {
  const products = [...scope.productIds].sort().join(',');
  return `churn_v${version}_account_${scope.accountId}_${scope.timeZone}_products_${products}_day_${date}`;
}

export function lastCacheableDate(today: CalendarDate): CalendarDate {
  return addCalendarDays(today, -FRESHNESS_HORIZON_DAYS);
}

function parseCachedDay(raw: string, date: CalendarDate): DayCounts | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null; // unreadable entry: recompute and overwrite
  }
  const parsed = cachedDaySchema.safeParse(value);
  if (!parsed.success || parsed.data.date !== date) {
    return null;
  }
  return parsed.data;
}

export class DailyCountsCache {
  constructor(
    private readonly store: CacheStore,
    private readonly version: CacheVersion
  ) {}

  /**
   * Counts for every day of `period`, chronological.
   * `load` is called at most twice: once for the uncached historical days
   * (as a single span) and once for the live days.
   */
  async load(
    scope: DailyCacheScope,
    period: Period,
    today: CalendarDate,
    load: DayCountsLoader
  ): Promise<DayCounts[]> {
    const version = this.version.current;
    const dates = eachDay(period);
    const cutoff = lastCacheableDate(today);
    const historical = dates.filter((date) => date <= cutoff);
    const live = dates.filter((date) => date > cutoff);

    const result = new Map<CalendarDate, DayCounts>();

    if (historical.length > 0) {
      const datesByKey = new Map(historical.map((date) => [dailyCacheKey(scope, version, date), date]));
      const cached = await this.store.getMany(Array.from(datesByKey.keys()));

      for (const [key, raw] of cached) {
        const date = datesByKey.get(key);
        const counts = date === undefined ? null : parseCachedDay(raw, date);
        if (date !== undefined && counts) {
          result.set(date, counts);
        }
      }

      const missing = new Set(historical.filter((date) => !result.has(date)));
      if (missing.size > 0) {
        const span = Array.from(missing);
        const fresh = await load({ startDate: span[0], endDate: span[span.length - 1] });
        for (const day of fresh) {
          if (!missing.has(day.date)) continue;
          await this.store.set(dailyCacheKey(scope, version, day.date), JSON.stringify(toCachedDay(day)));
          result.set(day.date, day);
        }
      }
    }

    if (live.length > 0) {
      const fresh = await load({ startDate: live[0], endDate: live[live.length - 1] });
      for (const day of fresh) {
        result.set(day.date, day);
      }
    }

    return dates.map((date) => {
      const counts = result.get(date);
      if (!counts) {
        throw new Error(`No churn counts were loaded for ${date}`);
      }
      return counts;
    });
  }
}

function toCachedDay(day: DayCounts): DayCounts {
  return {
    date: day.date,
    activeAtStart: day.activeAtStart,
    newSubscribers: day.newSubscribers,
    churnedSubscribers: day.churnedSubscribers,
    churnedMrrCents: day.churnedMrrCents,
  };
}
