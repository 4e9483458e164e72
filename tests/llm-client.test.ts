/**
 * Tests for LLM error classification
 */

import { describe, test, expect } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { llmErrorFromStatus, toLlmError } from '../src/clients/llm-client';
import { ClientError } from '../src/clients/types';

describe('llmErrorFromStatus', () => {
  test('should flag rate limits as retryable', () => {
    const error = llmErrorFromStatus(429, 'slow down');

    expect(error.code).toBe('RATE_LIMITED');
    expect(error.message).toBe('Rate limit exceeded');
    expect(error.retryable).toBe(true);
    expect(error.status).toBe(429);
  });

  test('should flag overload as retryable', () => {
    expect(llmErrorFromStatus(529, 'overloaded').code).toBe('API_OVERLOADED');
    expect(llmErrorFromStatus(529, 'overloaded').retryable).toBe(true);
  });

  test('should retry server errors', () => {
    const error = llmErrorFromStatus(502, 'bad gateway');

    expect(error.code).toBe('API_ERROR');
    expect(error.message).toBe('API error: bad gateway');
    expect(error.retryable).toBe(true);
  });

  test('should not retry client errors', () => {
    const error = llmErrorFromStatus(400, 'invalid model');

    expect(error.message).toBe('invalid model');
    expect(error.retryable).toBe(false);
  });
});

describe('toLlmError', () => {
  test('should pass ClientError through', () => {
    const original = new ClientError('EMPTY_RESPONSE', 'Model returned no text');

    expect(toLlmError(original)).toBe(original);
  });

  test('should treat connection failures as retryable', () => {
    const error = toLlmError(new Anthropic.APIConnectionError({ message: 'socket hang up' }));

    expect(error.code).toBe('CONNECTION_ERROR');
    expect(error.retryable).toBe(true);
  });

  test('should wrap plain errors', () => {
    const error = toLlmError(new Error('boom'));

    expect(error.code).toBe('UNKNOWN_ERROR');
    expect(error.message).toBe('boom');
    expect(error.retryable).toBe(false);
  });

  test('should handle non-errors', () => {
    expect(toLlmError('weird').message).toBe('An unknown error occurred');
  });
});
