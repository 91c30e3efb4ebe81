/**
 * Scan data source: load the candidate subscriptions once, classify in memory.
 * Cost grows with subscriber count, not with the length of the range.
 */

import {
  isActiveAtStart,
  isChurnedDuring,
  isNewDuring,
  monthlyRecurringRevenueCents,
} from '../metrics/classify.js';
import { addCalendarDays, eachDay, localDate, startOfDay } from '../time/period.js';
import type { CalendarDate, RawDailyCounts, RawDayCounts } from '../types.js';
import type { ChurnDataSource, DailyCountsQuery, SubscriptionRepository } from './types.js';

export class SubscriptionScanSource implements ChurnDataSource {
  readonly name = 'scan';

  constructor(private readonly repository: SubscriptionRepository) {}

  async fetchDailyCounts(query: DailyCountsQuery): Promise<RawDailyCounts> {
    const { period, timeZone } = query;

    const subscriptions = await this.repository.findOverlapping({
      accountId: query.accountId,
      productIds: query.productIds,
      createdBefore: startOfDay(addCalendarDays(period.endDate, 1), timeZone),
      activeSince: startOfDay(period.startDate, timeZone),
    });

    const days = new Map<CalendarDate, RawDayCounts>();
    for (const date of eachDay(period)) {
      days.set(date, { date, newSubscribers: 0, churnedSubscribers: 0, churnedMrrCents: 0 });
    }

    let activeAtStart = 0;
    for (const subscription of subscriptions) {
      if (isActiveAtStart(subscription, period.startDate, timeZone)) {
        activeAtStart++;
      }

      if (isNewDuring(subscription, period.startDate, period.endDate, timeZone)) {
        const day = days.get(localDate(subscription.createdAt, timeZone));
        if (day) day.newSubscribers++;
      }

      if (
        subscription.deactivatedAt !== null &&
        isChurnedDuring(subscription, period.startDate, period.endDate, timeZone)
      ) {
        const day = days.get(localDate(subscription.deactivatedAt, timeZone));
        if (day) {
          day.churnedSubscribers++;
          day.churnedMrrCents += monthlyRecurringRevenueCents(subscription);
        }
      }
    }

    return { activeAtStart, days: Array.from(days.values()) };
  }
}
