/**
 * Elasticsearch-backed SearchIndex.
 */

import { Client } from '@elastic/elasticsearch';

import type { SearchIndex, SearchRequest, SearchResult } from './search-index.js';

export interface ElasticsearchOptions {
  node: string;
  index: string;
  apiKey?: string;
}

export class ElasticsearchSearchIndex implements SearchIndex {
  private readonly client: Client;
  private readonly index: string;

  constructor(options: ElasticsearchOptions) {
    this.client = new Client({
      node: options.node,
      ...(options.apiKey ? { auth: { apiKey: options.apiKey } } : {}),
    });
    this.index = options.index;
  }

  async search(request: SearchRequest): Promise<SearchResult> {
    const response = await this.client.search({
      index: this.index,
      size: request.size,
      track_total_hits: false,
      query: request.query,
      aggs: request.aggs,
    });
    return { aggregations: response.aggregations ?? {} };
  }
}
