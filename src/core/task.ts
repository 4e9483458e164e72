/**
 * Task - one schedulable unit of async work
 *
 * A task succeeds when `run` resolves and fails when it rejects or throws.
 * It talks to other tasks only through the Context it is given.
 */

import type { Context } from './context';
import { GraphError, TaskTimeoutError, toGraphError } from './errors';
import { ExponentialBackoff, type BackoffConfig } from '../utils/backoff';

export interface Task {
  readonly name: string;
  /** Higher runs first when the executor is concurrency-bounded */
  readonly priority?: number;
  run(context: Context): Promise<void>;
}

/**
 * Build a task from a function
 *
 * @example
 * const fetchUser = defineTask('fetch-user', async (ctx) => {
 *   ctx.set('user', await users.find(ctx.get('userId')));
 * });
 */
export function defineTask(
  name: string,
  run: (context: Context) => Promise<void>,
  options: { priority?: number } = {}
): Task {
  return { name, priority: options.priority, run };
}

/**
 * Fail the task with TaskTimeoutError when it does not settle within `timeoutMs`.
 * The wrapped work keeps running; its late writes still land in the context.
 */
export function withTimeout(task: Task, timeoutMs: number): Task {
  return {
    name: task.name,
    priority: task.priority,
    run: (context) =>
      new Promise<void>((resolve, reject) => {
        const timer = setTimeout(() => reject(new TaskTimeoutError(task.name, timeoutMs)), timeoutMs);

        void Promise.resolve()
          .then(() => task.run(context))
          .then(
            () => {
              clearTimeout(timer);
              resolve();
            },
            (error: unknown) => {
              clearTimeout(timer);
              reject(error);
            }
          );
      }),
  };
}

/**
 * Retry a task's own run with exponential backoff.
 * By default only errors flagged retryable are retried.
 */
export function withRetry(
  task: Task,
  backoff: Partial<BackoffConfig> = {},
  shouldRetry: (error: GraphError) => boolean = (error) => error.retryable
): Task {
  return {
    name: task.name,
    priority: task.priority,
    run: (context) =>
      new ExponentialBackoff(backoff).execute(
        () => task.run(context),
        (error) => shouldRetry(toGraphError(error))
      ),
  };
}
