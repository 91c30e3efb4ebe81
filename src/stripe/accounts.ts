/**
 * AccountDirectory backed by Stripe.
 * Accounts are the platform account or Stripe Connect accounts (acct_...).
 */

import type Stripe from 'stripe';

import type { AccountDirectory } from '../churn-service.js';
import type { SubscriptionProduct } from '../types.js';
import { PLATFORM_ACCOUNT_ID, mapStripeError, requestOptionsFor } from './client.js';

export interface StripeAccountDirectoryOptions {
  /** Zone for the platform account and for accounts without a dashboard zone. */
  defaultTimeZone: string;
  largeAccounts: string[];
}

export class StripeAccountDirectory implements AccountDirectory {
  private readonly timeZones = new Map<string, string>();
  private readonly largeAccounts: Set<string>;

  constructor(
    private readonly stripe: Stripe,
    private readonly options: StripeAccountDirectoryOptions
  ) {
    this.largeAccounts = new Set(options.largeAccounts);
  }

  async getTimeZone(accountId: string): Promise<string> {
    if (accountId === PLATFORM_ACCOUNT_ID) {
      return this.options.defaultTimeZone;
    }

    const known = this.timeZones.get(accountId);
    if (known) {
      return known;
    }

    try {
      const account = await this.stripe.accounts.retrieve(accountId);
      const timeZone = account.settings?.dashboard.timezone ?? this.options.defaultTimeZone;
      this.timeZones.set(accountId, timeZone);
      return timeZone;
    } catch (error) {
      throw mapStripeError(error);
    }
  }

  async isLargeAccount(accountId: string): Promise<boolean> {
    return this.largeAccounts.has(accountId);
  }

  /**
   * Products that carry at least one active recurring price, sorted by name.
   */
  async listSubscriptionProducts(accountId: string): Promise<SubscriptionProduct[]> {
    try {
      const products = new Map<string, SubscriptionProduct>();
      for await (const price of this.stripe.prices.list(
        { type: 'recurring', active: true, expand: ['data.product'], limit: 100 },
        requestOptionsFor(accountId)
      )) {
        const product = price.product;
        if (typeof product === 'string') {
          products.set(product, { id: product, name: product, alive: true });
        } else if ('name' in product) {
          products.set(product.id, { id: product.id, name: product.name, alive: product.active });
        }
        // Deleted products carry no name and are skipped
      }
      return Array.from(products.values()).sort((a, b) => a.name.localeCompare(b.name));
    } catch (error) {
      throw mapStripeError(error);
    }
  }
}
