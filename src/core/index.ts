/**
 * Core modules export
 */

export { Context, defineKey } from './context';
export type { ContextKey, ContextEntry } from './context';
export { defineTask, withTimeout, withRetry } from './task';
export type { Task } from './task';
export { TaskGraph } from './task-graph';
export { GraphExecutor } from './executor';
export type { ExecutorOptions, RunResult, RunSuccess, RunFailure } from './executor';
export {
  GraphError,
  MissingKeyError,
  InvalidContextValueError,
  CycleDetectedError,
  UnknownNodeError,
  TaskExecutionFailedError,
  TaskTimeoutError,
  GraphStateError,
  toGraphError,
} from './errors';
