/**
 * Index data source: day-bucketed aggregations against a search index.
 *
 * A fetch issues exactly two searches whatever the length of the range:
 *   1. churn and new-subscription histograms, bucketed per day in the merchant's zone
 *   2. a point-in-time cardinality of subscriptions active when the range opens
 */

import { z } from 'zod';

import { monthlyRecurringRevenueCents } from '../metrics/classify.js';
import { addCalendarDays, eachDay, startOfDay } from '../time/period.js';
import type { CalendarDate, RawDailyCounts, Subscription } from '../types.js';
import type { ChurnDataSource, DailyCountsQuery } from './types.js';

// --- Index document ---

/** One document per subscription. Timestamps are ISO instants. */
export interface SubscriptionIndexDocument {
  subscription_id: string;
  seller_id: string;
  product_id: string;
  created_at: string;
  subscription_deactivated_at: string | null;
  monthly_recurring_revenue: number;
}

export function toIndexDocument(
  subscription: Subscription,
  accountId: string
): SubscriptionIndexDocument {
  return {
    subscription_id: subscription.id,
    seller_id: accountId,
    product_id: subscription.productId,
    created_at: new Date(subscription.createdAt * 1000).toISOString(),
    subscription_deactivated_at: subscription.deactivatedAt === null
      ? null
      : new Date(subscription.deactivatedAt * 1000).toISOString(),
    monthly_recurring_revenue: monthlyRecurringRevenueCents(subscription),
  };
}

// --- Query DSL subset ---

export type DateField = 'created_at' | 'subscription_deactivated_at';

export interface RangeBounds {
  gte?: string;
  lt?: string;
}

export interface BoolQuery {
  filter?: IndexQuery[];
  should?: IndexQuery[];
  must_not?: IndexQuery[];
  minimum_should_match?: number;
}

export type IndexQuery =
  | { term: { seller_id: string } }
  | { terms: { product_id: string[] } }
  | { exists: { field: DateField | 'subscription_id' } }
  | { range: { [K in DateField]?: RangeBounds } }
  | { bool: BoolQuery };

export type MetricAggregation =
  | { cardinality: { field: 'subscription_id' } }
  | { sum: { field: 'monthly_recurring_revenue' } };

export interface DateHistogramAggregation {
  date_histogram: {
    field: DateField;
    calendar_interval: 'day';
    time_zone: string;
    format: 'yyyy-MM-dd';
    min_doc_count: 0;
    extended_bounds: { min: CalendarDate; max: CalendarDate };
  };
  aggs: Record<string, MetricAggregation>;
}

export interface FilterAggregation {
  filter: IndexQuery;
  aggs: Record<string, DateHistogramAggregation>;
}

export type IndexAggregation = MetricAggregation | DateHistogramAggregation | FilterAggregation;

export interface SearchRequest {
  size: 0;
  query: IndexQuery;
  aggs: Record<string, IndexAggregation>;
}

export interface SearchResult {
  aggregations: unknown;
}

export interface SearchIndex {
  search(request: SearchRequest): Promise<SearchResult>;
}

// --- Response shapes ---

const metricValueSchema = z.object({ value: z.number() });

const histogramSchema = z.object({
  buckets: z.array(
    z.object({
      key_as_string: z.string(),
      doc_count: z.number(),
      unique_subscriptions: metricValueSchema,
      churned_mrr: metricValueSchema.optional(),
    })
  ),
});

const dailyAggregationsSchema = z.object({
  churned_by_date: z.object({ by_date: histogramSchema }),
  new_by_date: z.object({ by_date: histogramSchema }),
});

const activeAggregationsSchema = z.object({
  active_subscriptions: metricValueSchema,
});

// --- Source ---

export class IndexAggregationSource implements ChurnDataSource {
  readonly name = 'index';

  constructor(private readonly index: SearchIndex) {}

  async fetchDailyCounts(query: DailyCountsQuery): Promise<RawDailyCounts> {
    const [daily, active] = await Promise.all([
      this.index.search(buildDailyRequest(query)),
      this.index.search(buildActiveAtStartRequest(query)),
    ]);

    const aggregations = dailyAggregationsSchema.parse(daily.aggregations);
    const activeAtStart = activeAggregationsSchema.parse(active.aggregations).active_subscriptions.value;

    const churned = new Map<CalendarDate, { count: number; mrr: number }>();
    for (const bucket of aggregations.churned_by_date.by_date.buckets) {
      churned.set(bucket.key_as_string, {
        count: bucket.unique_subscriptions.value,
        mrr: bucket.churned_mrr?.value ?? 0,
      });
    }

    const created = new Map<CalendarDate, number>();
    for (const bucket of aggregations.new_by_date.by_date.buckets) {
      created.set(bucket.key_as_string, bucket.unique_subscriptions.value);
    }

    return {
      activeAtStart: Math.round(activeAtStart),
      days: eachDay(query.period).map((date) => ({
        date,
        newSubscribers: Math.round(created.get(date) ?? 0),
        churnedSubscribers: Math.round(churned.get(date)?.count ?? 0),
        churnedMrrCents: Math.round(churned.get(date)?.mrr ?? 0),
      })),
    };
  }
}

function baseFilters(query: DailyCountsQuery): IndexQuery[] {
  return [
    { term: { seller_id: query.accountId } },
    { terms: { product_id: query.productIds } },
    { exists: { field: 'subscription_id' } },
  ];
}

function periodBounds(query: DailyCountsQuery): RangeBounds {
  const { period, timeZone } = query;
  return {
    gte: startOfDay(period.startDate, timeZone).toISOString(),
    lt: startOfDay(addCalendarDays(period.endDate, 1), timeZone).toISOString(),
  };
}

function dayHistogram(
  field: DateField,
  query: DailyCountsQuery,
  aggs: Record<string, MetricAggregation>
): DateHistogramAggregation {
  return {
    date_histogram: {
      field,
      calendar_interval: 'day',
      time_zone: query.timeZone,
      format: 'yyyy-MM-dd',
      min_doc_count: 0,
      extended_bounds: { min: query.period.startDate, max: query.period.endDate },
    },
    aggs,
  };
}

export function buildDailyRequest(query: DailyCountsQuery): SearchRequest {
  const bounds = periodBounds(query);
  return {
    size: 0,
    query: {
      bool: {
        filter: baseFilters(query),
        should: [
          { range: { subscription_deactivated_at: bounds } },
          { range: { created_at: bounds } },
        ],
        minimum_should_match: 1,
      },
    },
    aggs: {
      churned_by_date: {
        filter: { range: { subscription_deactivated_at: bounds } },
        aggs: {
          by_date: dayHistogram('subscription_deactivated_at', query, {
            unique_subscriptions: { cardinality: { field: 'subscription_id' } },
            churned_mrr: { sum: { field: 'monthly_recurring_revenue' } },
          }),
        },
      },
      new_by_date: {
        filter: { range: { created_at: bounds } },
        aggs: {
          by_date: dayHistogram('created_at', query, {
            unique_subscriptions: { cardinality: { field: 'subscription_id' } },
          }),
        },
      },
    },
  };
}

export function buildActiveAtStartRequest(query: DailyCountsQuery): SearchRequest {
  const periodStart = startOfDay(query.period.startDate, query.timeZone).toISOString();
  return {
    size: 0,
    query: {
      bool: {
        filter: [...baseFilters(query), { range: { created_at: { lt: periodStart } } }],
        should: [
          { bool: { must_not: [{ exists: { field: 'subscription_deactivated_at' } }] } },
          { range: { subscription_deactivated_at: { gte: periodStart } } },
        ],
        minimum_should_match: 1,
      },
    },
    aggs: {
      active_subscriptions: { cardinality: { field: 'subscription_id' } },
    },
  };
}
