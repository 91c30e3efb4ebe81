/**
 * Tests for the Stripe adapters.
 * API traffic goes through a fake fetch, so nothing leaves the process.
 */

import Stripe from 'stripe';
import { describe, it, expect } from 'vitest';
import { StripeAccountDirectory } from './accounts.js';
import {
  PLATFORM_ACCOUNT_ID,
  StripeClientError,
  StripeSubscriptionRepository,
  createStripeClient,
  mapStripeError,
  recurrenceUnitFor,
  requestOptionsFor,
  toSubscription,
} from './client.js';
import type { StripeSubscriptionLike } from './client.js';

interface RecordedRequest {
  url: URL;
  stripeAccount: string | null;
}

/**
 * A Stripe client whose responses come from `routes`, keyed by request path.
 */
function createFakeStripe(routes: Record<string, { status?: number; body: unknown }>) {
  const requests: RecordedRequest[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    requests.push({ url, stripeAccount: new Headers(init?.headers).get('stripe-account') });

    const route = routes[url.pathname];
    const status = route?.status ?? (route ? 200 : 404);
    const body = route?.body ?? { error: { type: 'invalid_request_error', message: `No route for ${url.pathname}` } };
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json' },
    });
  };

  const stripe = createStripeClient('sk_test_123', {
    httpClient: Stripe.createFetchHttpClient(fakeFetch),
  });
  return { stripe, requests };
}

function list(data: unknown[]) {
  return { object: 'list', data, has_more: false, url: '/v1/list' };
}

function createStripeSubscription(overrides: Partial<StripeSubscriptionLike> = {}): StripeSubscriptionLike {
  return {
    id: 'sub_123',
    status: 'active',
    created: 1700000000,
    ended_at: null,
    items: {
      data: [
        {
          quantity: 1,
          price: {
            unit_amount: 1000,
            product: 'prod_monthly',
            recurring: { interval: 'month', interval_count: 1 },
          },
        },
      ],
    },
    ...overrides,
  };
}

describe('recurrenceUnitFor', () => {
  it('maps Stripe intervals to recurrence units', () => {
    expect(recurrenceUnitFor('month', 1)).toBe('monthly');
    expect(recurrenceUnitFor('month', 3)).toBe('quarterly');
    expect(recurrenceUnitFor('year', 1)).toBe('yearly');
  });

  it('passes other intervals through', () => {
    expect(recurrenceUnitFor('week', 1)).toBe('week');
    expect(recurrenceUnitFor('month', 2)).toBe('2-month');
  });
});

describe('requestOptionsFor', () => {
  it('routes connected accounts through the Stripe-Account header', () => {
    expect(requestOptionsFor(PLATFORM_ACCOUNT_ID)).toBeUndefined();
    expect(requestOptionsFor('acct_123')).toEqual({ stripeAccount: 'acct_123' });
  });
});

describe('toSubscription', () => {
  const included = new Set(['prod_monthly', 'prod_yearly']);

  it('normalizes price, product and lifecycle', () => {
    const subscription = createStripeSubscription({ ended_at: 1702000000 });
    expect(toSubscription(subscription, included)).toEqual({
      id: 'sub_123',
      productId: 'prod_monthly',
      createdAt: 1700000000,
      deactivatedAt: 1702000000,
      recurringPriceCents: 1000,
      recurrenceUnit: 'monthly',
    });
  });

  it('multiplies by quantity and reads expanded products', () => {
    const subscription = createStripeSubscription({
      items: {
        data: [
          {
            quantity: 3,
            price: {
              unit_amount: 12000,
              product: { id: 'prod_yearly' },
              recurring: { interval: 'year', interval_count: 1 },
            },
          },
        ],
      },
    });

    expect(toSubscription(subscription, included)).toMatchObject({
      productId: 'prod_yearly',
      recurringPriceCents: 36000,
      recurrenceUnit: 'yearly',
    });
  });

  it('skips items on other products and one-off prices', () => {
    const subscription = createStripeSubscription({
      items: {
        data: [
          { price: { unit_amount: 500, product: 'prod_setup', recurring: null } },
          { price: { unit_amount: 700, product: 'prod_other', recurring: { interval: 'month', interval_count: 1 } } },
          { price: { unit_amount: 900, product: 'prod_monthly', recurring: { interval: 'month', interval_count: 1 } } },
        ],
      },
    });

    expect(toSubscription(subscription, included)?.recurringPriceCents).toBe(900);
    expect(toSubscription(subscription, new Set(['prod_setup']))).toBeNull();
  });

  it('ignores subscriptions that never started', () => {
    expect(toSubscription(createStripeSubscription({ status: 'incomplete' }), included)).toBeNull();
    expect(toSubscription(createStripeSubscription({ status: 'incomplete_expired' }), included)).toBeNull();
  });
});

describe('createStripeClient', () => {
  it('rejects keys that are not secret keys', () => {
    expect(() => createStripeClient('pk_test_123')).toThrow('Invalid Stripe API key format');
    expect(() => createStripeClient('')).toThrow('Invalid Stripe API key format');
  });
});

describe('mapStripeError', () => {
  it('passes StripeClientError through', () => {
    const error = new StripeClientError('rate_limit', 'slow down', true);
    expect(mapStripeError(error)).toBe(error);
  });

  it('wraps plain errors and unknown values', () => {
    expect(mapStripeError(new Error('boom'))).toMatchObject({ type: 'unknown', message: 'boom', retriable: false });
    expect(mapStripeError('boom')).toMatchObject({ type: 'unknown', message: 'An unknown error occurred' });
  });
});

describe('StripeSubscriptionRepository', () => {
  it('lists subscriptions created before the window and drops ones that ended before it', async () => {
    const { stripe, requests } = createFakeStripe({
      '/v1/subscriptions': {
        body: list([
          createStripeSubscription({ id: 'sub_live' }),
          createStripeSubscription({ id: 'sub_ended_early', ended_at: 1700500000 }),
          createStripeSubscription({ id: 'sub_ended_inside', ended_at: 1701500000 }),
          createStripeSubscription({ id: 'sub_incomplete', status: 'incomplete' }),
        ]),
      },
    });
    const repository = new StripeSubscriptionRepository(stripe);

    const subscriptions = await repository.findOverlapping({
      accountId: PLATFORM_ACCOUNT_ID,
      productIds: ['prod_monthly'],
      createdBefore: new Date('2024-01-01T00:00:00Z'),
      activeSince: new Date('2023-12-01T00:00:00Z'),
    });

    expect(subscriptions.map((subscription) => subscription.id)).toEqual(['sub_live', 'sub_ended_inside']);
    expect(requests).toHaveLength(1);
    expect(requests[0].url.searchParams.get('status')).toBe('all');
    expect(requests[0].url.searchParams.get('created[lt]')).toBe('1704067200');
    expect(requests[0].stripeAccount).toBeNull();
  });

  it('queries connected accounts on their behalf', async () => {
    const { stripe, requests } = createFakeStripe({ '/v1/subscriptions': { body: list([]) } });

    await new StripeSubscriptionRepository(stripe).findOverlapping({
      accountId: 'acct_connected',
      productIds: ['prod_monthly'],
      createdBefore: new Date('2024-01-01T00:00:00Z'),
      activeSince: new Date('2023-12-01T00:00:00Z'),
    });

    expect(requests[0].stripeAccount).toBe('acct_connected');
  });

  it('maps API failures to StripeClientError', async () => {
    const { stripe } = createFakeStripe({
      '/v1/subscriptions': {
        status: 401,
        body: { error: { type: 'invalid_request_error', message: 'Invalid API Key provided' } },
      },
    });

    await expect(
      new StripeSubscriptionRepository(stripe).findOverlapping({
        accountId: PLATFORM_ACCOUNT_ID,
        productIds: ['prod_monthly'],
        createdBefore: new Date('2024-01-01T00:00:00Z'),
        activeSince: new Date('2023-12-01T00:00:00Z'),
      })
    ).rejects.toMatchObject({
      name: 'StripeClientError',
      type: 'authentication',
      message: 'Authentication failed: Invalid API Key provided',
    });
  });
});

describe('StripeAccountDirectory', () => {
  it('lists products with active recurring prices, sorted by name', async () => {
    const { stripe, requests } = createFakeStripe({
      '/v1/prices': {
        body: list([
          { id: 'price_1', product: { id: 'prod_yearly', object: 'product', name: 'Yearly', active: true } },
          { id: 'price_2', product: { id: 'prod_monthly', object: 'product', name: 'Monthly', active: true } },
          { id: 'price_3', product: { id: 'prod_monthly', object: 'product', name: 'Monthly', active: true } },
          { id: 'price_4', product: { id: 'prod_old', object: 'product', name: 'Archived', active: false } },
          { id: 'price_5', product: { id: 'prod_gone', object: 'product', deleted: true } },
        ]),
      },
    });
    const directory = new StripeAccountDirectory(stripe, { defaultTimeZone: 'UTC', largeAccounts: [] });

    expect(await directory.listSubscriptionProducts(PLATFORM_ACCOUNT_ID)).toEqual([
      { id: 'prod_old', name: 'Archived', alive: false },
      { id: 'prod_monthly', name: 'Monthly', alive: true },
      { id: 'prod_yearly', name: 'Yearly', alive: true },
    ]);
    expect(requests[0].url.searchParams.get('type')).toBe('recurring');
  });

  it('uses the dashboard time zone of connected accounts and remembers it', async () => {
    const { stripe, requests } = createFakeStripe({
      '/v1/accounts/acct_connected': {
        body: { id: 'acct_connected', object: 'account', settings: { dashboard: { timezone: 'America/New_York' } } },
      },
    });
    const directory = new StripeAccountDirectory(stripe, { defaultTimeZone: 'UTC', largeAccounts: [] });

    expect(await directory.getTimeZone('acct_connected')).toBe('America/New_York');
    expect(await directory.getTimeZone('acct_connected')).toBe('America/New_York');
    expect(requests).toHaveLength(1);
  });

  it('uses the default zone for the platform account', async () => {
    const { stripe, requests } = createFakeStripe({});
    const directory = new StripeAccountDirectory(stripe, { defaultTimeZone: 'Europe/Berlin', largeAccounts: [] });

    expect(await directory.getTimeZone(PLATFORM_ACCOUNT_ID)).toBe('Europe/Berlin');
    expect(requests).toHaveLength(0);
  });

  it('knows the configured large accounts', async () => {
    const { stripe } = createFakeStripe({});
    const directory = new StripeAccountDirectory(stripe, { defaultTimeZone: 'UTC', largeAccounts: ['acct_big'] });

    expect(await directory.isLargeAccount('acct_big')).toBe(true);
    expect(await directory.isLargeAccount('acct_small')).toBe(false);
  });
});
