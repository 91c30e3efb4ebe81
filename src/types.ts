/**
 * Domain types for churn-analytics-mcp: calendar periods, normalized
 * subscriptions, day-level counts and the churn report document.
 * Collaborator contracts live beside their modules (sources, service).
 */

// --- Calendar ---

/**
 * A calendar day in the merchant's local time zone, formatted `yyyy-MM-dd`.
 * Never a Date: a day must not move when the host time zone changes.
 */
export type CalendarDate = string;

export interface Period {
  startDate: CalendarDate;
  endDate: CalendarDate;
}

/**
 * Raw date parameters as they arrive from a request layer.
 * `start_time`/`end_time` take priority over `from`/`to`.
 */
export interface DateParams {
  start_time?: string;
  end_time?: string;
  from?: string;
  to?: string;
}

// --- Input types (normalized from the subscription store) ---

export const RECURRENCE_UNITS = ['monthly', 'quarterly', 'yearly'] as const;

export type RecurrenceUnit = (typeof RECURRENCE_UNITS)[number];

export interface Subscription {
  id: string;
  productId: string;
  createdAt: number;            // unix timestamp
  deactivatedAt: number | null; // unix timestamp, null while still active
  recurringPriceCents: number;
  /** One of RECURRENCE_UNITS; anything else contributes zero MRR. */
  recurrenceUnit: string;
}

export interface SubscriptionProduct {
  id: string;
  name: string;
  alive: boolean;
}

// --- Day-level counts ---

/** What a data source reports for a single day. */
export interface RawDayCounts {
  date: CalendarDate;
  newSubscribers: number;
  churnedSubscribers: number;
  churnedMrrCents: number;
}

/** Raw counts for a contiguous range of days, plus the active count on its first day. */
export interface RawDailyCounts {
  activeAtStart: number;
  days: RawDayCounts[];
}

/** A day's raw counts with that day's point-in-time active count. This is what gets cached. */
export interface DayCounts extends RawDayCounts {
  activeAtStart: number;
}

export interface DailyBucket extends DayCounts {
  customerChurnRate: number;    // 0-100 percentage, 2 decimals
}

export interface ChurnCounts {
  activeAtStart: number;
  newSubscribers: number;
  churnedSubscribers: number;
}

export interface PeriodSummary extends ChurnCounts {
  churnedMrrCents: number;
  totalBase: number;
  customerChurnRate: number;
}

// --- Output types ---

export interface ChurnMetrics {
  customer_churn_rate: number;
  last_period_churn_rate: number;
  churned_subscribers: number;
  churned_mrr_cents: number;
}

export interface DailyChurnEntry {
  date: CalendarDate;
  month: string;
  month_index: number;
  customer_churn_rate: number;
  churned_subscribers: number;
  churned_mrr_cents: number;
  active_at_start: number;
  new_subscribers: number;
}

/** The churn report consumed by charting and reporting layers. */
export interface ChurnDocument {
  start_date: CalendarDate;
  end_date: CalendarDate;
  metrics: ChurnMetrics;
  daily_data: DailyChurnEntry[];
}
