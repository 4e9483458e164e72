/**
 * Outbound clients export
 */

export { LlmClient, toLlmError, llmErrorFromStatus } from './llm-client';
export { SerperSearchClient } from './search-client';
export { WebScraper, htmlToText, utf8Length } from './web-scraper';
export { ClientError } from './types';
export type { CompletionRequest, LanguageModel, SearchProvider, PageScraper, FetchFn } from './types';
