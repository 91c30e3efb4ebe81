/**
 * Programmatic exports for churn-analytics-mcp.
 * Use this when embedding the churn engine or the server in another application.
 */

// Server
export { createContext, createServer, callTool, runServer } from './server.js';
export type { ServerContext, ToolResult } from './server.js';
export { loadConfig } from './config.js';
export type { Config } from './config.js';

// Engine
export { ChurnService } from './churn-service.js';
export type {
  AccountDirectory,
  ChurnRequest,
  ChurnServiceDeps,
  FetchOptions,
} from './churn-service.js';

// Types
export type {
  CalendarDate,
  ChurnDocument,
  ChurnMetrics,
  DailyBucket,
  DailyChurnEntry,
  DateParams,
  DayCounts,
  Period,
  PeriodSummary,
  RawDailyCounts,
  RawDayCounts,
  RecurrenceUnit,
  Subscription,
  SubscriptionProduct,
} from './types.js';
export { RECURRENCE_UNITS } from './types.js';
export { ConfigError, InvalidDateFormatError, InvalidDateRangeError } from './errors.js';

// Data sources
export type {
  ChurnDataSource,
  DailyCountsQuery,
  OverlapQuery,
  SubscriptionRepository,
} from './sources/types.js';
export { SubscriptionScanSource } from './sources/scan.js';
export { IndexAggregationSource, toIndexDocument } from './sources/search-index.js';
export type { SearchIndex, SearchRequest, SubscriptionIndexDocument } from './sources/search-index.js';
export { ElasticsearchSearchIndex } from './sources/elasticsearch.js';

// Caching
export { CacheVersion, MemoryCacheStore } from './cache/store.js';
export type { CacheStore } from './cache/store.js';
export { DailyCountsCache, dailyCacheKey, FRESHNESS_HORIZON_DAYS } from './cache/daily-cache.js';

// Stripe
export {
  PLATFORM_ACCOUNT_ID,
  StripeClientError,
  StripeSubscriptionRepository,
  createStripeClient,
  mapStripeError,
} from './stripe/client.js';
export { StripeAccountDirectory } from './stripe/accounts.js';

// Metric computation functions (pure functions)
export {
  isActiveAtStart,
  isChurnedDuring,
  isNewDuring,
  monthlyRecurringRevenueCents,
} from './metrics/classify.js';
export { customerChurnRate, summarizePeriod } from './metrics/churn.js';
export { buildDailySeries, summarizeDailySeries, withRunningActive } from './metrics/daily.js';
export { previousPeriod, resolvePeriod, timeWindow } from './time/period.js';

// Formatting utilities
export { churnToMarkdown, formatCents, formatPercent } from './utils/format.js';
