/**
 * Stripe API client wrapper for churn-analytics-mcp.
 * Handles API calls, pagination, normalization, and error handling.
 */

import Stripe from 'stripe';

import type { OverlapQuery, SubscriptionRepository } from '../sources/types.js';
import type { Subscription } from '../types.js';

/** Account id that addresses the platform's own Stripe account rather than a connected one. */
export const PLATFORM_ACCOUNT_ID = 'platform';

export interface StripeClientOptions {
  /** Replaces the default transport, e.g. Stripe.createFetchHttpClient(fakeFetch). */
  httpClient?: Stripe.HttpClient;
}

/**
 * Create and configure a Stripe client instance.
 *
 * @param apiKey - Stripe secret API key (sk_test_... or sk_live_...)
 * @throws Error if apiKey is invalid format
 */
export function createStripeClient(apiKey: string, options: StripeClientOptions = {}): Stripe {
  if (!apiKey || !apiKey.startsWith('sk_')) {
    throw new Error('Invalid Stripe API key format. Expected key starting with sk_');
  }

  return new Stripe(apiKey, {
    apiVersion: '2025-02-24.acacia',
    typescript: true,
    maxNetworkRetries: 2,
    ...(options.httpClient ? { httpClient: options.httpClient } : {}),
  });
}

/**
 * Request options that route a call to a connected account.
 */
export function requestOptionsFor(accountId: string): Stripe.RequestOptions | undefined {
  return accountId === PLATFORM_ACCOUNT_ID ? undefined : { stripeAccount: accountId };
}

/**
 * Map a Stripe price interval onto a recurrence unit.
 * Intervals with no monthly equivalent are passed through and contribute zero MRR.
 */
export function recurrenceUnitFor(interval: string, intervalCount: number): string {
  if (interval === 'month' && intervalCount === 1) return 'monthly';
  if (interval === 'month' && intervalCount === 3) return 'quarterly';
  if (interval === 'year' && intervalCount === 1) return 'yearly';
  return intervalCount === 1 ? interval : `${intervalCount}-${interval}`;
}

/**
 * The parts of a Stripe subscription the engine reads.
 */
export interface StripeSubscriptionLike {
  id: string;
  status: string;
  created: number;
  ended_at: number | null;
  items: {
    data: Array<{
      quantity?: number;
      price: {
        unit_amount: number | null;
        product: string | { id: string };
        recurring: { interval: string; interval_count: number } | null;
      };
    }>;
  };
}

const NEVER_STARTED_STATUSES = new Set(['incomplete', 'incomplete_expired']);

/**
 * Normalize a Stripe subscription to our Subscription type.
 * The first recurring item on an included product determines product and price.
 *
 * @returns null when no item belongs to `productIds` or the subscription never started
 */
export function toSubscription(
  subscription: StripeSubscriptionLike,
  productIds: ReadonlySet<string>
): Subscription | null {
  if (NEVER_STARTED_STATUSES.has(subscription.status)) {
    return null;
  }

  for (const item of subscription.items.data) {
    const price = item.price;
    const productId = typeof price.product === 'string' ? price.product : price.product.id;
    if (!price.recurring || !productIds.has(productId)) {
      continue;
    }

    return {
      id: subscription.id,
      productId,
      createdAt: subscription.created,
      deactivatedAt: subscription.ended_at,
      recurringPriceCents: (price.unit_amount ?? 0) * (item.quantity ?? 1),
      recurrenceUnit: recurrenceUnitFor(price.recurring.interval, price.recurring.interval_count),
    };
  }

  return null;
}

/**
 * Subscription records read straight from Stripe.
 */
export class StripeSubscriptionRepository implements SubscriptionRepository {
  constructor(private readonly stripe: Stripe) {}

  async findOverlapping(query: OverlapQuery): Promise<Subscription[]> {
    const createdBefore = Math.floor(query.createdBefore.getTime() / 1000);
    const activeSince = Math.floor(query.activeSince.getTime() / 1000);
    const productIds = new Set(query.productIds);

    try {
      const subscriptions: Subscription[] = [];
      for await (const subscription of this.stripe.subscriptions.list(
        { status: 'all', created: { lt: createdBefore }, limit: 100 },
        requestOptionsFor(query.accountId)
      )) {
        if (subscription.ended_at !== null && subscription.ended_at < activeSince) {
          continue;
        }
        const normalized = toSubscription(subscription, productIds);
        if (normalized) {
          subscriptions.push(normalized);
        }
      }
      return subscriptions;
    } catch (error) {
      throw mapStripeError(error);
    }
  }
}

export type StripeClientErrorType =
  | 'authentication'
  | 'rate_limit'
  | 'invalid_request'
  | 'api_connection'
  | 'api_error'
  | 'permission'
  | 'unknown';

export class StripeClientError extends Error {
  readonly type: StripeClientErrorType;
  readonly retriable: boolean;

  constructor(type: StripeClientErrorType, message: string, retriable: boolean) {
    super(message);
    this.name = 'StripeClientError';
    this.type = type;
    this.retriable = retriable;
  }
}

/**
 * Map Stripe SDK errors to our StripeClientError type.
 */
export function mapStripeError(error: unknown): StripeClientError {
  if (error instanceof StripeClientError) {
    return error;
  }

  if (error instanceof Stripe.errors.StripeAuthenticationError) {
    return new StripeClientError('authentication', `Authentication failed: ${error.message || 'Invalid API key'}`, false);
  }
  if (error instanceof Stripe.errors.StripeRateLimitError) {
    return new StripeClientError('rate_limit', `Rate limit exceeded: ${error.message || 'Too many requests'}`, true);
  }
  if (error instanceof Stripe.errors.StripeConnectionError) {
    return new StripeClientError('api_connection', `Connection error: ${error.message || 'Failed to connect to Stripe'}`, true);
  }
  if (error instanceof Stripe.errors.StripePermissionError) {
    return new StripeClientError('permission', `Permission denied: ${error.message}`, false);
  }
  if (error instanceof Stripe.errors.StripeInvalidRequestError) {
    return new StripeClientError('invalid_request', `Invalid request: ${error.message}`, false);
  }
  if (error instanceof Stripe.errors.StripeAPIError) {
    return new StripeClientError('api_error', `Stripe API error: ${error.message}`, true);
  }

  if (error instanceof Error) {
    return new StripeClientError('unknown', error.message, false);
  }
  return new StripeClientError('unknown', 'An unknown error occurred', false);
}
