/**
 * Tests for Context
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { Context, defineKey } from '../src/core/context';
import { InvalidContextValueError, MissingKeyError } from '../src/core/errors';

const Count = defineKey('count', z.number().int());
const Tags = defineKey('tags', z.array(z.string()));

describe('Context', () => {
  let context: Context;

  beforeEach(() => {
    context = new Context();
  });

  test('should return what was set', () => {
    context.set('greeting', 'hello');
    context.set(Count, 3);

    expect(context.get('greeting')).toBe('hello');
    expect(context.get(Count)).toBe(3);
    expect(context.has(Count)).toBe(true);
  });

  test('should throw MissingKeyError for unwritten keys', () => {
    expect(() => context.get('absent')).toThrow(MissingKeyError);
    expect(() => context.get(Count)).toThrow('Missing context key: count');
  });

  test('should return undefined from tryGet for unwritten keys', () => {
    expect(context.tryGet(Count)).toBeUndefined();
    expect(context.tryGet('absent')).toBeUndefined();
  });

  test('should validate typed reads against the key schema', () => {
    context.set('count', 'three');

    expect(() => context.get(Count)).toThrow(InvalidContextValueError);
    expect(context.get('count')).toBe('three');
  });

  test('should name the offending element of an invalid value', () => {
    context.set('tags', ['a', 2]);

    expect(() => context.get(Tags)).toThrow(
      'Invalid value for context key tags: 1: Expected string, received number'
    );
  });

  test('should seed initial values', () => {
    const seeded = new Context({ query: 'q', limit: 5 });

    expect(seeded.get('query')).toBe('q');
    expect(seeded.keys()).toEqual(['query', 'limit']);
    expect(seeded.size).toBe(2);
  });

  test('should let the last write win and bump the version', () => {
    context.set(Count, 1);
    context.set('other', true);
    context.set(Count, 2);

    expect(context.get(Count)).toBe(2);
    expect(context.entry(Count)).toEqual({ value: 2, version: 3, writer: undefined });
  });

  test('should attribute writes made through a writer view', () => {
    const view = context.withWriter('producer');
    view.set(Count, 7);

    expect(context.get(Count)).toBe(7);
    expect(context.entry(Count)?.writer).toBe('producer');
  });

  test('should share state between views', () => {
    const first = context.withWriter('first');
    const second = context.withWriter('second');
    first.set('shared', 1);
    second.set('shared', 2);

    expect(first.get('shared')).toBe(2);
    expect(context.entry('shared')).toEqual({ value: 2, version: 2, writer: 'second' });
  });

  test('should return a shallow snapshot', () => {
    context.set('a', 1);
    const snapshot = context.snapshot();
    context.set('a', 2);

    expect(snapshot).toEqual({ a: 1 });
  });
});
