/**
 * Answer workflow: enhance-query -> retrieve-data -> generate-answer
 */

import type { LanguageModel, PageScraper, SearchProvider } from '../clients/types';
import { Context } from '../core/context';
import type { GraphExecutor, RunResult } from '../core/executor';
import { withRetry } from '../core/task';
import { TaskGraph } from '../core/task-graph';
import { DataRetrieverTask } from './data-retriever';
import { GenerateAnswerTask } from './generate';
import { ContextKeys } from './keys';
import { PromptBuilder } from './prompt-builder';
import { QueryEnhanceTask } from './query-enhancer';

export interface WorkflowServices {
  llm: LanguageModel;
  search: SearchProvider;
  scraper: PageScraper;
  minContentLength: number;
}

export type AnswerOutcome =
  | { status: 'answered'; answer: string; result: RunResult }
  | { status: 'failed'; reason: string; result: RunResult };

/**
 * Build a fresh graph for one query
 */
export function createAgentWorkflow(query: string, services: WorkflowServices): TaskGraph {
  const prompts = new PromptBuilder();
  const graph = new TaskGraph();

  const enhance = graph.addNode(new QueryEnhanceTask(query, services.llm, prompts));
  const retrieve = graph.addNode(
    withRetry(
      new DataRetrieverTask(services.search, services.scraper, {
        minContentLength: services.minContentLength,
      }),
      { maxRetries: 2 }
    )
  );
  const generate = graph.addNode(new GenerateAnswerTask(services.llm, prompts));

  graph.addEdge(enhance, retrieve);
  graph.addEdge(retrieve, generate);

  return graph;
}

/**
 * Run the workflow for one query and read the answer back out of the context
 */
export async function answerQuery(
  query: string,
  services: WorkflowServices,
  executor: GraphExecutor
): Promise<AnswerOutcome> {
  const graph = createAgentWorkflow(query, services);
  const result = await executor.run(graph, new Context());

  if (result.status === 'failure') {
    return {
      status: 'failed',
      reason: `Task ${result.failedNode} failed: ${result.error.message}`,
      result,
    };
  }

  const answer = result.context.tryGet(ContextKeys.answer);
  if (answer === undefined) {
    return { status: 'failed', reason: 'Failed to retrieve answer from context', result };
  }

  return { status: 'answered', answer, result };
}

export { ContextKeys, PromptBuilder, QueryEnhanceTask, DataRetrieverTask, GenerateAnswerTask };
export { normalizeSearchTerms } from './prompt-builder';
export { isScrapeableUrl } from './data-retriever';
export { NO_SOURCES_ANSWER } from './generate';
