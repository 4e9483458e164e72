/**
 * Contracts the workflow tasks depend on; implemented by the clients in this
 * directory and by fakes in tests
 */

import type { SearchResponse } from '../types';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
}

export interface LanguageModel {
  complete(request: CompletionRequest): Promise<string>;
}

export interface SearchProvider {
  search(query: string): Promise<SearchResponse>;
}

export interface PageScraper {
  scrapeText(url: string): Promise<string>;
}

export type FetchFn = typeof fetch;

/**
 * Failure of an outbound call, classified for retry decisions
 */
export class ClientError extends Error {
  readonly code: string;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(code: string, message: string, options: { retryable?: boolean; status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClientError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.status = options.status;
  }
}
