/**
 * Search Client - Google results through the Serper API
 */

import { z } from 'zod';
import type { SearchConfig, SearchResponse } from '../types';
import { getLogger } from '../utils/logger';
import { ClientError, type FetchFn, type SearchProvider } from './types';

const SearchResponseSchema = z.object({
  searchParameters: z.object({
    q: z.string(),
    type: z.string(),
    engine: z.string(),
  }),
  organic: z
    .array(
      z.object({
        title: z.string(),
        link: z.string(),
        snippet: z.string().default(''),
        position: z.number(),
        date: z.string().optional(),
      })
    )
    .default([]),
});

export class SerperSearchClient implements SearchProvider {
  private config: SearchConfig;
  private fetchFn: FetchFn;

  constructor(config: SearchConfig, fetchFn: FetchFn = fetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  /**
   * Build the request URL. The API key travels in a header, never in the URL.
   */
  buildUrl(query: string): string {
    const terms = query.split(/\s+/).filter((term) => term.length > 0);
    if (this.config.site) {
      terms.push(`site:${this.config.site}`);
    }

    const params = new URLSearchParams({
      q: terms.join(' '),
      num: String(this.config.resultCount),
    });
    if (this.config.recency) {
      params.set('tbs', this.config.recency);
    }

    return `${this.config.endpoint}?${params.toString()}`;
  }

  async search(query: string): Promise<SearchResponse> {
    const logger = getLogger();

    if (!this.config.apiKey) {
      throw new ClientError('MISSING_API_KEY', 'SERPER_API_KEY not set');
    }

    const url = this.buildUrl(query);
    logger.debug('Executing search', { url });

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'X-API-KEY': this.config.apiKey },
      });
    } catch (error) {
      throw new ClientError('CONNECTION_ERROR', error instanceof Error ? error.message : 'Search request failed', {
        retryable: true,
        cause: error,
      });
    }

    logger.debug('Search response received', { status: response.status });

    if (!response.ok) {
      throw new ClientError('SEARCH_FAILED', `Search request failed with status ${response.status}`, {
        retryable: response.status === 429 || response.status >= 500,
        status: response.status,
      });
    }

    const parsed = SearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ClientError('INVALID_RESPONSE', `Unexpected search response: ${parsed.error.issues[0]?.message}`);
    }

    return parsed.data;
  }
}
