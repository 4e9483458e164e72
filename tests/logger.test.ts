/**
 * Tests for Logger
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../src/utils/logger';

function readLines(path: string): Array<Record<string, unknown>> {
  return readFileSync(path, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('Logger', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'taskgraph-logs-'));
    file = join(dir, 'nested', 'app.log');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('should write JSON lines at or above the level', () => {
    const logger = new Logger({ level: 'info', file, console: false });

    logger.debug('hidden');
    logger.info('visible', { requestId: 'r1' });

    const lines = readLines(file);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'info', message: 'visible', requestId: 'r1' });
  });

  test('should log task events with the node id', () => {
    const logger = new Logger({ level: 'debug', file, console: false });

    logger.taskEvent('failed', 'fetch', { code: 'TASK_EXECUTION_FAILED' });
    logger.taskEvent('skipped', 'parse');

    const lines = readLines(file);
    expect(lines[0]).toMatchObject({ level: 'error', message: 'task_failed', nodeId: 'fetch' });
    expect(lines[1]).toMatchObject({ level: 'warn', message: 'task_skipped', nodeId: 'parse' });
  });

  test('should grade requests by status', () => {
    const logger = new Logger({ level: 'debug', file, console: false });

    logger.request('POST', '/api/agent1', 500, 12);

    expect(readLines(file)[0]).toMatchObject({
      level: 'error',
      message: 'http_request',
      method: 'POST',
      path: '/api/agent1',
      status: 500,
      durationMs: 12,
    });
  });
});
