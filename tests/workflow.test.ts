/**
 * Tests for the answer workflow
 */

import { describe, test, expect, beforeEach } from 'vitest';
import {
  GraphExecutor,
  MetricsCollector,
  answerQuery,
  createAgentWorkflow,
  type WorkflowServices,
} from '../src';
import { FakeLanguageModel, FakePageScraper, FakeSearchProvider, organicResult } from './fakes';

const PAGE_TEXT = 'A detailed account of the events in the village. '.repeat(5);

function createServices(overrides: Partial<WorkflowServices> = {}): WorkflowServices {
  return {
    llm: new FakeLanguageModel(['village events', 'Two homes were demolished [Source 1].']),
    search: new FakeSearchProvider([organicResult('https://example.org/report')]),
    scraper: new FakePageScraper({ 'https://example.org/report': PAGE_TEXT }),
    minContentLength: 100,
    ...overrides,
  };
}

describe('createAgentWorkflow', () => {
  test('should chain the three tasks', () => {
    const graph = createAgentWorkflow('q', createServices());

    expect(graph.topologicalSort()).toEqual(['enhance-query', 'retrieve-data', 'generate-answer']);
    expect(graph.edges()).toEqual([
      { from: 'enhance-query', to: 'retrieve-data' },
      { from: 'retrieve-data', to: 'generate-answer' },
    ]);
  });
});

describe('answerQuery', () => {
  let executor: GraphExecutor;

  beforeEach(() => {
    executor = new GraphExecutor({ metrics: new MetricsCollector() });
  });

  test('should return the generated answer', async () => {
    const services = createServices();

    const outcome = await answerQuery('What happened in the village?', services, executor);

    expect(outcome.status).toBe('answered');
    if (outcome.status !== 'answered') return;
    expect(outcome.answer).toBe('Two homes were demolished [Source 1].');
    expect(outcome.result.completed).toEqual(['enhance-query', 'retrieve-data', 'generate-answer']);
    expect(outcome.result.context.get('enhanced_query')).toBe('village events');
  });

  test('should report the failing node and skip the rest', async () => {
    const services = createServices({
      search: new FakeSearchProvider(new Error('SERPER_API_KEY not set')),
    });

    const outcome = await answerQuery('q', services, executor);

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.reason).toBe('Task retrieve-data failed: Failed to retrieve data: SERPER_API_KEY not set');
    expect(outcome.result.status).toBe('failure');
    if (outcome.result.status !== 'failure') return;
    expect(outcome.result.skipped).toEqual(['generate-answer']);
  });

  test('should build a new graph per query', async () => {
    const services = createServices({
      llm: new FakeLanguageModel(['first terms', 'first answer', 'second terms', 'second answer']),
      scraper: new FakePageScraper({ 'https://example.org/report': PAGE_TEXT }),
    });

    const first = await answerQuery('first', services, executor);
    const second = await answerQuery('second', services, executor);

    expect(first.status === 'answered' && first.answer).toBe('first answer');
    expect(second.status === 'answered' && second.answer).toBe('second answer');
  });
});
