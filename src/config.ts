/**
 * Environment configuration.
 */

import { z } from 'zod';

import { ConfigError } from './errors.js';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  // Stripe
  STRIPE_SECRET_KEY: z.string().startsWith('sk_', 'Expected key starting with sk_'),

  // Churn engine
  CHURN_DEFAULT_TIME_ZONE: z.string().refine(isTimeZone, 'Unknown IANA time zone').default('UTC'),
  CHURN_LARGE_ACCOUNTS: z
    .string()
    .default('')
    .transform((value) => value.split(',').map((id) => id.trim()).filter((id) => id.length > 0)),
  CHURN_CACHE_VERSION: z.coerce.number().int().nonnegative().default(0),

  // Elasticsearch (optional - enables the index data source)
  ELASTICSEARCH_URL: z.string().url().optional(),
  ELASTICSEARCH_INDEX: z.string().min(1).default('subscriptions'),
  ELASTICSEARCH_API_KEY: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface Config {
  stripeSecretKey: string;
  defaultTimeZone: string;
  largeAccounts: string[];
  cacheVersion: number;
  elasticsearch: { url: string; index: string; apiKey?: string } | null;
}

/**
 * Parse configuration from environment variables.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const data = result.data;
  return {
    stripeSecretKey: data.STRIPE_SECRET_KEY,
    defaultTimeZone: data.CHURN_DEFAULT_TIME_ZONE,
    largeAccounts: data.CHURN_LARGE_ACCOUNTS,
    cacheVersion: data.CHURN_CACHE_VERSION,
    elasticsearch: data.ELASTICSEARCH_URL
      ? {
          url: data.ELASTICSEARCH_URL,
          index: data.ELASTICSEARCH_INDEX,
          ...(data.ELASTICSEARCH_API_KEY ? { apiKey: data.ELASTICSEARCH_API_KEY } : {}),
        }
      : null,
  };
}
