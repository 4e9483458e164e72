/**
 * Tests for the HTTP API
 */

import { describe, test, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { GraphExecutor } from '../src/core/executor';
import { createApp } from '../src/server';
import { resetMetrics } from '../src/utils/metrics';
import { FakeLanguageModel, FakePageScraper, FakeSearchProvider, organicResult } from './fakes';

const PAGE_TEXT = 'Testimony collected by the field researcher in the area. '.repeat(4);

describe('HTTP API', () => {
  let llm: FakeLanguageModel;
  let search: FakeSearchProvider;
  let app: Express;

  beforeEach(() => {
    resetMetrics();
    llm = new FakeLanguageModel(['testimony area', 'The researcher collected testimony [Source 1].']);
    search = new FakeSearchProvider([organicResult('https://example.org/testimony')]);
    app = createApp({
      services: {
        llm,
        search,
        scraper: new FakePageScraper({ 'https://example.org/testimony': PAGE_TEXT }),
        minContentLength: 100,
      },
      executor: new GraphExecutor(),
    });
  });

  test('GET /health should report healthy', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', message: 'Service is healthy' });
  });

  test('POST /api/agent1 should return the answer', async () => {
    const res = await request(app).post('/api/agent1').send({ query: 'Who collected testimony?' });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ answer: 'The researcher collected testimony [Source 1].' });
    expect(search.queries).toEqual(['testimony area']);
  });

  test('POST /api/agent1 should reject a whitespace query before running anything', async () => {
    const res = await request(app).post('/api/agent1').send({ query: '  \n ' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'Query cannot be empty or only whitespace',
    });
    expect(llm.requests).toEqual([]);
  });

  test('POST /api/agent1 should reject a body without a query', async () => {
    const res = await request(app).post('/api/agent1').send({ question: 'hi' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('BAD_REQUEST');
  });

  test('POST /api/agent1 should reject malformed JSON', async () => {
    const res = await request(app)
      .post('/api/agent1')
      .set('Content-Type', 'application/json')
      .send('{"query": ');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'BAD_REQUEST', message: 'Request body is not valid JSON' });
  });

  test('POST /api/agent1 should map a node failure to 500', async () => {
    const failing = createApp({
      services: {
        llm: new FakeLanguageModel([new Error('Rate limit exceeded')]),
        search,
        scraper: new FakePageScraper({}),
        minContentLength: 100,
      },
      executor: new GraphExecutor(),
    });

    const res = await request(failing).post('/api/agent1').send({ query: 'anything' });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      error: 'INTERNAL_SERVER_ERROR',
      message: 'Task enhance-query failed: Failed to enhance query: Rate limit exceeded',
    });
    expect(search.queries).toEqual([]);
  });

  test('GET /metrics should count runs', async () => {
    await request(app).post('/api/agent1').send({ query: 'Who collected testimony?' });

    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.body.totalRuns).toBe(1);
    expect(res.body.succeededRuns).toBe(1);
    expect(res.body.completedTasks).toBe(3);
  });

  test('OPTIONS should answer CORS preflight', async () => {
    const res = await request(app)
      .options('/api/agent1')
      .set('Origin', 'https://client.example')
      .set('Access-Control-Request-Method', 'POST');

    expect(res.status).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('*');
    expect(res.headers['access-control-allow-methods']).toBe('GET, POST, OPTIONS');
  });

  test('unknown routes should return 404', async () => {
    const res = await request(app).get('/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'NOT_FOUND', message: 'Route GET /nope not found' });
  });
});
