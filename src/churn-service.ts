/**
 * Churn report orchestration.
 * Resolves the period and products, loads day counts (through the cache for
 * large accounts), and assembles the churn document.
 */

import type { DailyCacheScope, DailyCountsCache } from './cache/daily-cache.js';
import {
  buildDailySeries,
  summarizeDailySeries,
  toDailyEntries,
  withRunningActive,
} from './metrics/daily.js';
import type { ChurnDataSource } from './sources/types.js';
import {
  assertValidPeriod,
  isValidPeriod,
  parseCalendarDate,
  previousPeriod,
  resolvePeriod,
  todayIn,
} from './time/period.js';
import type {
  CalendarDate,
  ChurnDocument,
  DateParams,
  DayCounts,
  Period,
  PeriodSummary,
  SubscriptionProduct,
} from './types.js';

/**
 * Account-level facts the engine needs but does not own.
 */
export interface AccountDirectory {
  /** IANA time zone that anchors the merchant's calendar days. */
  getTimeZone(accountId: string): Promise<string>;
  /** Large accounts get per-day caching. */
  isLargeAccount(accountId: string): Promise<boolean>;
  /** Recurring-billing products owned by the account. */
  listSubscriptionProducts(accountId: string): Promise<SubscriptionProduct[]>;
}

export interface ChurnRequest {
  accountId: string;
  startDate?: CalendarDate;
  endDate?: CalendarDate;
  params?: DateParams;
  /** Restrict to these products; empty or absent means all of the account's subscription products. */
  productIds?: string[];
}

export interface FetchOptions {
  /**
   * How to treat an end date before the start date.
   * false (default): return null. true: throw InvalidDateRangeError.
   */
  strict?: boolean;
}

export interface ChurnServiceDeps {
  accounts: AccountDirectory;
  source: ChurnDataSource;
  /** Omit to compute every day live, even for large accounts. */
  cache?: DailyCountsCache;
  now?: () => Date;
}

interface ReportScope extends DailyCacheScope {
  useCache: boolean;
  today: CalendarDate;
}

export class ChurnService {
  private readonly accounts: AccountDirectory;
  private readonly source: ChurnDataSource;
  private readonly cache: DailyCountsCache | undefined;
  private readonly now: () => Date;

  constructor(deps: ChurnServiceDeps) {
    this.accounts = deps.accounts;
    this.source = deps.source;
    this.cache = deps.cache;
    this.now = deps.now ?? (() => new Date());
  }

  async hasSubscriptionProducts(accountId: string): Promise<boolean> {
    const products = await this.accounts.listSubscriptionProducts(accountId);
    return products.some((product) => product.alive);
  }

  async availableProducts(accountId: string): Promise<SubscriptionProduct[]> {
    return this.accounts.listSubscriptionProducts(accountId);
  }

  /**
   * Build the churn document for a request.
   *
   * @returns null when the account has no eligible subscription products, or
   *   when the range is inverted and `strict` is off
   * @throws InvalidDateFormatError for unparseable date params
   * @throws InvalidDateRangeError for an inverted range when `strict` is on
   */
  async fetchChurnData(request: ChurnRequest, options: FetchOptions = {}): Promise<ChurnDocument | null> {
    const timeZone = await this.accounts.getTimeZone(request.accountId);
    const period = resolvePeriod({
      startDate: request.startDate,
      endDate: request.endDate,
      params: request.params,
      now: this.now(),
      timeZone,
    });

    if (options.strict) {
      assertValidPeriod(period);
    }

    const scope = await this.resolveScope(request.accountId, timeZone, request.productIds);
    if (!scope) {
      return null;
    }
    if (!isValidPeriod(period)) {
      return null;
    }

    const buckets = buildDailySeries(await this.loadDays(scope, period));
    const summary = summarizeDailySeries(buckets);
    const lastPeriod = await this.summarize(scope, previousPeriod(period));

    return {
      start_date: period.startDate,
      end_date: period.endDate,
      metrics: {
        customer_churn_rate: summary.customerChurnRate,
        last_period_churn_rate: lastPeriod.customerChurnRate,
        churned_subscribers: summary.churnedSubscribers,
        churned_mrr_cents: summary.churnedMrrCents,
      },
      daily_data: toDailyEntries(buckets, period.startDate),
    };
  }

  /**
   * Churn rate for an explicit period. Always strict about the range.
   * Dates are parsed like request params, so malformed ones raise InvalidDateFormatError.
   * Returns 0 when the account has no eligible products.
   */
  async customerChurnRate(request: {
    accountId: string;
    startDate: CalendarDate;
    endDate: CalendarDate;
    productIds?: string[];
  }): Promise<number> {
    const period: Period = {
      startDate: parseCalendarDate(request.startDate),
      endDate: parseCalendarDate(request.endDate),
    };
    assertValidPeriod(period);

    const timeZone = await this.accounts.getTimeZone(request.accountId);
    const scope = await this.resolveScope(request.accountId, timeZone, request.productIds);
    if (!scope) {
      return 0;
    }
    return (await this.summarize(scope, period)).customerChurnRate;
  }

  private async summarize(scope: ReportScope, period: Period): Promise<PeriodSummary> {
    return summarizeDailySeries(buildDailySeries(await this.loadDays(scope, period)));
  }

  private async resolveScope(
    accountId: string,
    timeZone: string,
    requestedProductIds: string[] | undefined
  ): Promise<ReportScope | null> {
    const products = (await this.accounts.listSubscriptionProducts(accountId))
      .filter((product) => product.alive);

    const requested = new Set(requestedProductIds ?? []);
    const productIds = products
      .filter((product) => requested.size === 0 || requested.has(product.id))
      .map((product) => product.id)
      .sort();

    if (productIds.length === 0) {
      return null;
    }

    return {
      accountId,
      timeZone,
      productIds,
      useCache: this.cache !== undefined && (await this.accounts.isLargeAccount(accountId)),
      today: todayIn(timeZone, this.now()),
    };
  }

  private async loadDays(scope: ReportScope, period: Period): Promise<DayCounts[]> {
    const fetchLive = async (span: Period): Promise<DayCounts[]> =>
      withRunningActive(
        await this.source.fetchDailyCounts({
          accountId: scope.accountId,
          productIds: scope.productIds,
          period: span,
          timeZone: scope.timeZone,
        })
      );

    if (this.cache && scope.useCache) {
      return this.cache.load(scope, period, scope.today, fetchLive);
    }
    return fetchLive(period);
  }
}
