/**
 * Error taxonomy for graph construction and execution
 */

import type { ExecutionError, NodeId } from '../types';

export class GraphError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(code: string, message: string, options: { cause?: unknown; retryable?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }

  toExecutionError(): ExecutionError {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
    };
  }
}

/**
 * A task read a context key that no predecessor wrote
 */
export class MissingKeyError extends GraphError {
  readonly key: string;

  constructor(key: string) {
    super('MISSING_KEY', `Missing context key: ${key}`);
    this.key = key;
  }
}

export class InvalidContextValueError extends GraphError {
  readonly key: string;

  constructor(key: string, detail: string) {
    super('INVALID_CONTEXT_VALUE', `Invalid value for context key ${key}: ${detail}`);
    this.key = key;
  }
}

export class CycleDetectedError extends GraphError {
  readonly from: NodeId;
  readonly to: NodeId;
  /** Existing path from `to` back to `from` that the edge would close */
  readonly path: NodeId[];

  constructor(from: NodeId, to: NodeId, path: NodeId[]) {
    super('CYCLE_DETECTED', `Edge ${from} -> ${to} would create a cycle: ${[...path, to].join(' -> ')}`);
    this.from = from;
    this.to = to;
    this.path = path;
  }
}

export class UnknownNodeError extends GraphError {
  readonly nodeId: NodeId;

  constructor(nodeId: NodeId) {
    super('UNKNOWN_NODE', `Unknown node: ${nodeId}`);
    this.nodeId = nodeId;
  }
}

export class TaskExecutionFailedError extends GraphError {
  constructor(description: string, options: { cause?: unknown; retryable?: boolean; code?: string } = {}) {
    super(options.code ?? 'TASK_EXECUTION_FAILED', description, options);
  }
}

export class TaskTimeoutError extends TaskExecutionFailedError {
  readonly timeoutMs: number;

  constructor(taskName: string, timeoutMs: number) {
    super(`Task ${taskName} timed out after ${timeoutMs}ms`, { code: 'TASK_TIMEOUT', retryable: true });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Misuse of the engine itself, e.g. mutating or re-running a graph
 */
export class GraphStateError extends GraphError {
  constructor(message: string) {
    super('GRAPH_STATE', message);
  }
}

/**
 * Normalize anything a task threw into a GraphError
 */
export function toGraphError(error: unknown): GraphError {
  if (error instanceof GraphError) {
    return error;
  }
  if (error instanceof Error) {
    return new TaskExecutionFailedError(error.message, { cause: error });
  }
  return new TaskExecutionFailedError(
    typeof error === 'string' ? error : 'An unknown error occurred',
    { cause: error }
  );
}
