/**
 * In-process stand-ins for the outbound clients
 */

import type { CompletionRequest, LanguageModel, PageScraper, SearchProvider } from '../src/clients/types';
import type { OrganicResult, SearchResponse } from '../src/types';

export class FakeLanguageModel implements LanguageModel {
  readonly requests: CompletionRequest[] = [];
  private replies: Array<string | Error>;

  constructor(replies: Array<string | Error>) {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('No scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export function organicResult(link: string, position = 1): OrganicResult {
  return { title: `Result ${position}`, link, snippet: '', position };
}

export class FakeSearchProvider implements SearchProvider {
  readonly queries: string[] = [];

  constructor(private readonly outcome: OrganicResult[] | Error) {}

  async search(query: string): Promise<SearchResponse> {
    this.queries.push(query);
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return {
      searchParameters: { q: query, type: 'search', engine: 'google' },
      organic: this.outcome,
    };
  }
}

export class FakePageScraper implements PageScraper {
  readonly urls: string[] = [];

  constructor(private readonly pages: Record<string, string | Error>) {}

  async scrapeText(url: string): Promise<string> {
    this.urls.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new Error(`No page for ${url}`);
    }
    if (page instanceof Error) {
      throw page;
    }
    return page;
  }
}
