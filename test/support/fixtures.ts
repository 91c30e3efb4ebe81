/**
 * Subscription fixtures shared by the scenario tests.
 */

import type { Subscription, SubscriptionProduct } from '../../src/types.js';
import type { AccountFixture } from './in-memory.js';

export const MERCHANT = 'acct_merchant';
export const EASTERN_MERCHANT = 'acct_eastern';
export const EMPTY_MERCHANT = 'acct_empty';

export const MONTHLY_PRODUCT = 'prod_monthly';
export const YEARLY_PRODUCT = 'prod_yearly';
export const ARCHIVED_PRODUCT = 'prod_archived';

/** Unix seconds for a UTC wall-clock time, e.g. at('2023-12-01 12:00:00'). */
export function at(dateTime: string): number {
  return Date.parse(`${dateTime.replace(' ', 'T')}Z`) / 1000;
}

export function createSubscription(overrides: Partial<Subscription> & { id: string }): Subscription {
  return {
    productId: MONTHLY_PRODUCT,
    createdAt: at('2023-12-01 12:00:00'),
    deactivatedAt: null,
    recurringPriceCents: 1000,
    recurrenceUnit: 'monthly',
    ...overrides,
  };
}

const products: SubscriptionProduct[] = [
  { id: MONTHLY_PRODUCT, name: 'Monthly Plan', alive: true },
  { id: YEARLY_PRODUCT, name: 'Yearly Plan', alive: true },
  { id: ARCHIVED_PRODUCT, name: 'Old Plan', alive: false },
];

/**
 * December 2023:
 * - four subscriptions start on Dec 1 (three monthly, one yearly)
 * - one monthly subscription starts on Dec 16
 * - a monthly subscription churns on Dec 20, the yearly one on Dec 25
 */
export const decemberSubscriptions: Subscription[] = [
  createSubscription({ id: 'sub_active_1' }),
  createSubscription({ id: 'sub_active_2' }),
  createSubscription({ id: 'sub_new', createdAt: at('2023-12-16 12:00:00') }),
  createSubscription({ id: 'sub_churned_monthly', deactivatedAt: at('2023-12-20 12:00:00') }),
  createSubscription({
    id: 'sub_churned_yearly',
    productId: YEARLY_PRODUCT,
    recurringPriceCents: 12000,
    recurrenceUnit: 'yearly',
    deactivatedAt: at('2023-12-25 12:00:00'),
  }),
  createSubscription({
    id: 'sub_archived',
    productId: ARCHIVED_PRODUCT,
    deactivatedAt: at('2023-12-10 12:00:00'),
  }),
];

/** Same merchant shape, but the base predates the period. */
export const establishedSubscriptions: Subscription[] = decemberSubscriptions.map((subscription) =>
  subscription.id === 'sub_new' ? subscription : { ...subscription, createdAt: at('2023-11-15 12:00:00') }
);

/** A New York merchant with activity close to midnight UTC. */
export const easternSubscriptions: Subscription[] = [
  createSubscription({ id: 'sub_ny_base', createdAt: at('2023-11-01 15:00:00') }),
  createSubscription({
    id: 'sub_ny_late_churn',
    createdAt: at('2023-11-01 15:00:00'),
    deactivatedAt: at('2023-12-21 03:00:00'), // Dec 20, 22:00 in New York
  }),
  createSubscription({ id: 'sub_ny_late_signup', createdAt: at('2023-12-01 02:00:00') }), // Nov 30 locally
  createSubscription({
    id: 'sub_ny_same_day',
    createdAt: at('2023-12-05 14:00:00'),
    deactivatedAt: at('2023-12-05 20:00:00'),
  }),
];

export function buildAccounts(options: { large?: boolean; subscriptions?: Subscription[] } = {}): Record<string, AccountFixture> {
  return {
    [MERCHANT]: {
      timeZone: 'UTC',
      large: options.large ?? false,
      products,
      subscriptions: options.subscriptions ?? decemberSubscriptions,
    },
    [EASTERN_MERCHANT]: {
      timeZone: 'America/New_York',
      large: options.large ?? false,
      products,
      subscriptions: easternSubscriptions,
    },
    [EMPTY_MERCHANT]: {
      timeZone: 'UTC',
      products: [{ id: ARCHIVED_PRODUCT, name: 'Old Plan', alive: false }],
      subscriptions: [],
    },
  };
}
