/**
 * Formatting utilities for churn-analytics-mcp.
 * Converts churn reports to markdown for LLM consumption.
 */

import type { ChurnDocument, SubscriptionProduct } from '../types.js';

/**
 * Format cents to currency string.
 * @param cents - Amount in cents (can be negative or 0)
 * @param currency - Currency code (default "usd")
 * @returns Formatted string like "$12.50" or "-$5.00"
 */
export function formatCents(cents: number, currency: string = 'usd'): string {
  const isNegative = cents < 0;
  const dollars = Math.abs(cents) / 100;

  const formatted = dollars.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });

  const symbol = getCurrencySymbol(currency);
  return isNegative ? `-${symbol}${formatted}` : `${symbol}${formatted}`;
}

function getCurrencySymbol(currency: string): string {
  const symbols: Record<string, string> = {
    'usd': '$',
    'eur': '€',
    'gbp': '£',
    'jpy': '¥',
    'cad': 'CA$',
    'aud': 'A$',
  };
  return symbols[currency.toLowerCase()] || currency.toUpperCase() + ' ';
}

/**
 * Format percentage value.
 * @param value - Percentage as number (e.g., 4.25 for 4.25%)
 * @returns Formatted string like "4.25%"
 */
export function formatPercent(value: number): string {
  if (isNaN(value) || !isFinite(value)) {
    return '0.00%';
  }
  return `${value.toFixed(2)}%`;
}

/**
 * Format a churn report as markdown.
 * The daily table lists only days with activity to keep long ranges readable.
 */
export function churnToMarkdown(document: ChurnDocument, currency: string = 'usd'): string {
  const { metrics } = document;
  const lines = [
    '# Churn Analysis',
    '',
    `**Period:** ${document.start_date} to ${document.end_date} (${document.daily_data.length} days)`,
    '',
    '## Summary',
    `- **Customer Churn Rate:** ${formatPercent(metrics.customer_churn_rate)}`,
    `- **Last Period Churn Rate:** ${formatPercent(metrics.last_period_churn_rate)}`,
    `- **Churned Subscribers:** ${metrics.churned_subscribers}`,
    `- **Revenue Lost (MRR):** ${formatCents(metrics.churned_mrr_cents, currency)}`,
  ];

  const activeDays = document.daily_data.filter(
    (day) => day.new_subscribers > 0 || day.churned_subscribers > 0
  );

  lines.push('', '## Daily Activity');
  if (activeDays.length === 0) {
    lines.push('No new or churned subscribers in this period.');
    return lines.join('\n');
  }

  lines.push(
    '| Date | Active at start | New | Churned | Churn rate | Revenue lost |',
    '|------|-----------------|-----|---------|------------|--------------|'
  );
  for (const day of activeDays) {
    lines.push(
      `| ${day.date} | ${day.active_at_start} | ${day.new_subscribers} | ${day.churned_subscribers} | ${formatPercent(day.customer_churn_rate)} | ${formatCents(day.churned_mrr_cents, currency)} |`
    );
  }

  return lines.join('\n');
}

export function productsToMarkdown(products: SubscriptionProduct[]): string {
  if (products.length === 0) {
    return '# Subscription Products\n\nNo subscription products found.';
  }

  const lines = ['# Subscription Products', ''];
  for (const product of products) {
    lines.push(`- **${product.name}** (\`${product.id}\`)${product.alive ? '' : ' [archived]'}`);
  }
  return lines.join('\n');
}
