/**
 * MCP server implementation for churn-analytics-mcp.
 * Registers the churn tools and wires the engine to Stripe and, when
 * configured, Elasticsearch.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type Stripe from 'stripe';
import { z } from 'zod';

import { DailyCountsCache } from './cache/daily-cache.js';
import { CacheVersion, MemoryCacheStore } from './cache/store.js';
import { ChurnService } from './churn-service.js';
import type { Config } from './config.js';
import { ElasticsearchSearchIndex } from './sources/elasticsearch.js';
import { SubscriptionScanSource } from './sources/scan.js';
import { IndexAggregationSource } from './sources/search-index.js';
import type { ChurnDataSource } from './sources/types.js';
import { StripeAccountDirectory } from './stripe/accounts.js';
import {
  PLATFORM_ACCOUNT_ID,
  StripeSubscriptionRepository,
  createStripeClient,
} from './stripe/client.js';
import { churnToMarkdown, productsToMarkdown } from './utils/format.js';

export interface ServerContext {
  service: ChurnService;
  cacheVersion: CacheVersion;
}

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const accountIdSchema = z.string().min(1).optional().default(PLATFORM_ACCOUNT_ID);

const getChurnSchema = z.object({
  account_id: accountIdSchema,
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  products: z.array(z.string()).optional(),
  format: z.enum(['markdown', 'json']).optional().default('markdown'),
});

const listProductsSchema = z.object({
  account_id: accountIdSchema,
});

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

/**
 * Build the engine and its collaborators from configuration.
 */
export function createContext(config: Config): ServerContext {
  let stripe: Stripe;
  try {
    stripe = createStripeClient(config.stripeSecretKey);
  } catch (error) {
    throw new Error(`Failed to initialize Stripe client: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  const accounts = new StripeAccountDirectory(stripe, {
    defaultTimeZone: config.defaultTimeZone,
    largeAccounts: config.largeAccounts,
  });

  const source: ChurnDataSource = config.elasticsearch
    ? new IndexAggregationSource(
        new ElasticsearchSearchIndex({
          node: config.elasticsearch.url,
          index: config.elasticsearch.index,
          apiKey: config.elasticsearch.apiKey,
        })
      )
    : new SubscriptionScanSource(new StripeSubscriptionRepository(stripe));

  const cacheVersion = new CacheVersion(config.cacheVersion);
  const service = new ChurnService({
    accounts,
    source,
    cache: new DailyCountsCache(new MemoryCacheStore(), cacheVersion),
  });

  console.error(`Churn data source: ${source.name}; cache version ${cacheVersion.current}`);
  return { service, cacheVersion };
}

/**
 * Execute a tool call. Failures come back as error results rather than throwing.
 */
export async function callTool(context: ServerContext, name: string, args: unknown): Promise<ToolResult> {
  try {
    switch (name) {
      case 'get_churn': {
        const input = getChurnSchema.parse(args ?? {});

        // Invalid ranges are reported to the caller instead of yielding an empty result
        const document = await context.service.fetchChurnData(
          {
            accountId: input.account_id,
            params: { from: input.start_date, to: input.end_date },
            productIds: input.products,
          },
          { strict: true }
        );

        if (!document) {
          return text(`No subscription products found for account ${input.account_id}.`);
        }

        return text(
          input.format === 'json'
            ? JSON.stringify(document, null, 2)
            : churnToMarkdown(document)
        );
      }

      case 'list_subscription_products': {
        const input = listProductsSchema.parse(args ?? {});
        const products = await context.service.availableProducts(input.account_id);
        return text(productsToMarkdown(products));
      }

      case 'invalidate_churn_cache': {
        const version = context.cacheVersion.bump();
        console.error(`Churn cache version bumped to ${version}`);
        return text(`Churn cache invalidated. Cache version is now ${version}.`);
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred';
    return {
      content: [{ type: 'text', text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
}

/**
 * Create and configure the MCP server.
 */
export function createServer(context: ServerContext): Server {
  const server = new Server(
    {
      name: 'churn-analytics-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: 'get_churn',
          description: 'Compute subscriber churn for a date range using Stripe\'s formula: churned / (active at start + new during period). Returns the churn rate, the previous period\'s rate, churned subscribers, revenue lost (churned MRR) and a per-day breakdown.',
          inputSchema: {
            type: 'object',
            properties: {
              account_id: {
                type: 'string',
                description: `Stripe Connect account id (acct_...), or "${PLATFORM_ACCOUNT_ID}" for the platform account (default)`,
              },
              start_date: {
                type: 'string',
                description: 'First day of the period, YYYY-MM-DD (default: one month before end_date)',
              },
              end_date: {
                type: 'string',
                description: 'Last day of the period, YYYY-MM-DD (default: today in the account\'s time zone)',
              },
              products: {
                type: 'array',
                items: { type: 'string' },
                description: 'Product ids to include (default: all subscription products)',
              },
              format: {
                type: 'string',
                enum: ['markdown', 'json'],
                description: 'Output format (default: markdown)',
              },
            },
            required: [],
          },
        },
        {
          name: 'list_subscription_products',
          description: 'List the subscription products that can be used to filter churn reports.',
          inputSchema: {
            type: 'object',
            properties: {
              account_id: {
                type: 'string',
                description: `Stripe Connect account id, or "${PLATFORM_ACCOUNT_ID}" (default)`,
              },
            },
            required: [],
          },
        },
        {
          name: 'invalidate_churn_cache',
          description: 'Discard every cached churn day by bumping the cache version. Use after correcting historical subscription data.',
          inputSchema: {
            type: 'object',
            properties: {},
            required: [],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(context, name, args);
  });

  return server;
}

/**
 * Run the server with stdio transport.
 */
export async function runServer(config: Config): Promise<void> {
  const server = createServer(createContext(config));
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Log to stderr (stdout is reserved for MCP protocol)
  console.error('Churn Analytics MCP server running on stdio');
}
