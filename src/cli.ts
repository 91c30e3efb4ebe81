#!/usr/bin/env node
/**
 * CLI entry point for churn-analytics-mcp.
 * Parses environment variables and command-line flags, then starts the MCP server.
 */

import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { ConfigError } from './errors.js';
import { runServer } from './server.js';

const HELP = `
churn-analytics-mcp - MCP server for subscriber churn analytics

USAGE:
  churn-analytics-mcp [OPTIONS]

OPTIONS:
  --key <key>    Stripe secret API key (overrides STRIPE_SECRET_KEY env var)
  --help, -h     Show this help message

ENVIRONMENT VARIABLES:
  STRIPE_SECRET_KEY          Stripe secret API key (required if --key not provided)
  CHURN_DEFAULT_TIME_ZONE    IANA zone for accounts without one (default: UTC)
  CHURN_LARGE_ACCOUNTS       Comma-separated account ids that get per-day caching
  CHURN_CACHE_VERSION        Initial cache format version (default: 0)
  ELASTICSEARCH_URL          Aggregate from this Elasticsearch node instead of scanning Stripe
  ELASTICSEARCH_INDEX        Index holding one document per subscription (default: subscriptions)
  ELASTICSEARCH_API_KEY      API key for the Elasticsearch node

EXAMPLES:
  STRIPE_SECRET_KEY=sk_test_123 churn-analytics-mcp
  churn-analytics-mcp --key sk_test_123

TOOLS:
  get_churn                    - Churn rate, revenue lost and daily breakdown for a date range
  list_subscription_products   - Products available for filtering
  invalidate_churn_cache       - Discard cached churn days
`;

/**
 * Parse command-line arguments and environment variables.
 * Returns the configuration or exits with error.
 */
function parseArgs(): Config {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP);
    process.exit(0);
  }

  const env: Record<string, string | undefined> = { ...process.env };
  const keyIndex = args.indexOf('--key');
  if (keyIndex !== -1 && keyIndex + 1 < args.length) {
    env.STRIPE_SECRET_KEY = args[keyIndex + 1];
  }

  try {
    return loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('Error: invalid configuration.');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      console.error('');
      console.error('Run --help for more information.');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  try {
    const config = parseArgs();

    const shutdown = (): void => {
      console.error('Shutting down gracefully...');
      process.exit(0);
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    await runServer(config);
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
