/**
 * Data source contracts.
 * Every source answers the same question with the same numbers; the
 * scan and index variants are interchangeable.
 */

import type { Period, RawDailyCounts, Subscription } from '../types.js';

export interface DailyCountsQuery {
  accountId: string;
  /** Subscription products to include. Never empty; the service resolves "all". */
  productIds: string[];
  period: Period;
  timeZone: string;
}

export interface ChurnDataSource {
  readonly name: string;
  /**
   * Raw counts for every day of `query.period` in chronological order,
   * plus the active count at the start of its first day.
   */
  fetchDailyCounts(query: DailyCountsQuery): Promise<RawDailyCounts>;
}

export interface OverlapQuery {
  accountId: string;
  productIds: string[];
  /** Only subscriptions created strictly before this instant. */
  createdBefore: Date;
  /** Only subscriptions still active, or deactivated at or after this instant. */
  activeSince: Date;
}

/**
 * Read access to subscription records.
 */
export interface SubscriptionRepository {
  findOverlapping(query: OverlapQuery): Promise<Subscription[]>;
}
