/**
 * Library entry: the graph engine plus the answer service built on it
 */

export * from './core';
export * from './utils';
export {
  LlmClient,
  SerperSearchClient,
  WebScraper,
  ClientError,
  htmlToText,
  toLlmError,
  llmErrorFromStatus,
} from './clients';
export type { CompletionRequest, LanguageModel, SearchProvider, PageScraper, FetchFn } from './clients';
export {
  answerQuery,
  createAgentWorkflow,
  ContextKeys,
  PromptBuilder,
  QueryEnhanceTask,
  DataRetrieverTask,
  GenerateAnswerTask,
  NO_SOURCES_ANSWER,
  isScrapeableUrl,
  normalizeSearchTerms,
} from './workflow';
export type { WorkflowServices, AnswerOutcome } from './workflow';
export { createApp, AppError } from './server';
export type { AppDependencies, ErrorBody, ErrorCode } from './server';
export { loadConfig, validateConfig, DEFAULT_CONFIG } from './config';
export type * from './types';
