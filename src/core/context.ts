/**
 * Context - run-scoped key/value store shared by the tasks of one graph run
 *
 * Every operation is synchronous, so each get/set is atomic on the event loop
 * and tasks can only interleave between them at their own await points. A
 * write is visible to every read that runs after `set` returns.
 *
 * Same-key writes resolve last-writer-wins in the order the `set` calls
 * execute. Each write is stamped with a per-context version so that order can
 * be observed through `entry()`.
 */

import type { z } from 'zod';
import { InvalidContextValueError, MissingKeyError } from './errors';
import type { NodeId } from '../types';

/**
 * A key name paired with the schema its value must satisfy when read
 */
export interface ContextKey<T> {
  readonly name: string;
  readonly schema: z.ZodType<T>;
}

export function defineKey<T>(name: string, schema: z.ZodType<T>): ContextKey<T> {
  return { name, schema };
}

export interface ContextEntry {
  value: unknown;
  version: number;
  writer?: NodeId;
}

type KeyRef<T> = string | ContextKey<T>;

function keyName<T>(key: KeyRef<T>): string {
  return typeof key === 'string' ? key : key.name;
}

interface Store {
  entries: Map<string, ContextEntry>;
  version: number;
}

export class Context {
  private store: Store;
  private defaultWriter?: NodeId;

  constructor(initial: Record<string, unknown> = {}) {
    this.store = { entries: new Map(), version: 0 };

    for (const [key, value] of Object.entries(initial)) {
      this.set(key, value);
    }
  }

  /**
   * View over the same store whose writes are attributed to `writer`
   */
  withWriter(writer: NodeId): Context {
    const view = new Context();
    view.store = this.store;
    view.defaultWriter = writer;
    return view;
  }

  /**
   * Store a value, overwriting any prior one
   */
  set<T>(key: KeyRef<T>, value: T, writer: NodeId | undefined = this.defaultWriter): void {
    this.store.version++;
    this.store.entries.set(keyName(key), { value, version: this.store.version, writer });
  }

  /**
   * Read a value, throwing MissingKeyError when it was never written.
   * Typed keys are validated against their schema.
   */
  get<T>(key: ContextKey<T>): T;
  get(key: string): unknown;
  get<T>(key: KeyRef<T>): unknown {
    const name = keyName(key);
    const entry = this.store.entries.get(name);
    if (!entry) {
      throw new MissingKeyError(name);
    }
    if (typeof key === 'string') {
      return entry.value;
    }
    return this.parse(key, entry.value);
  }

  /**
   * Read a value without failing when it is absent
   */
  tryGet<T>(key: ContextKey<T>): T | undefined;
  tryGet(key: string): unknown;
  tryGet<T>(key: KeyRef<T>): unknown {
    const entry = this.store.entries.get(keyName(key));
    if (!entry) {
      return undefined;
    }
    if (typeof key === 'string') {
      return entry.value;
    }
    return this.parse(key, entry.value);
  }

  has<T>(key: KeyRef<T>): boolean {
    return this.store.entries.has(keyName(key));
  }

  entry<T>(key: KeyRef<T>): ContextEntry | undefined {
    const entry = this.store.entries.get(keyName(key));
    return entry ? { ...entry } : undefined;
  }

  keys(): string[] {
    return Array.from(this.store.entries.keys());
  }

  /**
   * Shallow copy of all values
   */
  snapshot(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of this.store.entries) {
      result[key] = entry.value;
    }
    return result;
  }

  get size(): number {
    return this.store.entries.size;
  }

  private parse<T>(key: ContextKey<T>, value: unknown): T {
    const parsed = key.schema.safeParse(value);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new InvalidContextValueError(key.name, detail);
    }
    return parsed.data;
  }
}
