/**
 * Graph Executor - drives a TaskGraph to completion against one Context
 *
 * Ready nodes are dispatched as soon as their last predecessor succeeds,
 * without waiting for the rest of a batch. A failure skips every transitive
 * dependent of the failed node. In-flight work in unrelated branches is not
 * cancelled: it finishes, and its own dependents keep being dispatched.
 */

import { Context } from './context';
import { GraphError, GraphStateError, UnknownNodeError, toGraphError } from './errors';
import { withTimeout, type Task } from './task';
import type { TaskGraph } from './task-graph';
import type { NodeId, NodeRecord, NodeStatus, TaskFailure } from '../types';
import { getLogger } from '../utils/logger';
import { getMetrics, type MetricsCollector } from '../utils/metrics';

export interface ExecutorOptions {
  /** Upper bound on concurrently running tasks; 0 or unset means unbounded */
  maxParallel?: number;
  /** Fail any task that runs longer than this; 0 or unset disables it */
  taskTimeoutMs?: number;
  metrics?: MetricsCollector;
}

interface RunOutcome {
  context: Context;
  completed: NodeId[];
  records: Map<NodeId, NodeRecord>;
  durationMs: number;
}

export interface RunSuccess extends RunOutcome {
  status: 'success';
}

export interface RunFailure extends RunOutcome {
  status: 'failure';
  /** First node whose failure was recorded */
  failedNode: NodeId;
  error: GraphError;
  skipped: NodeId[];
  /** Every failure in settle order, the first one included */
  failures: TaskFailure<GraphError>[];
}

export type RunResult = RunSuccess | RunFailure;

interface Settled {
  nodeId: NodeId;
  startedAt: Date;
  finishedAt: Date;
  error?: GraphError;
}

/**
 * Settled dispatches in completion order
 */
class SettledQueue {
  private items: Settled[] = [];
  private waiters: Array<(settled: Settled) => void> = [];

  push(settled: Settled): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(settled);
    } else {
      this.items.push(settled);
    }
  }

  next(): Promise<Settled> {
    const settled = this.items.shift();
    if (settled) {
      return Promise.resolve(settled);
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

export class GraphExecutor {
  private maxParallel: number;
  private taskTimeoutMs: number;
  private metrics?: MetricsCollector;

  constructor(options: ExecutorOptions = {}) {
    this.maxParallel = options.maxParallel ?? 0;
    this.taskTimeoutMs = options.taskTimeoutMs ?? 0;
    this.metrics = options.metrics;
  }

  /**
   * Run every node of the graph once, in dependency order
   */
  async run(graph: TaskGraph, context: Context = new Context()): Promise<RunResult> {
    const logger = getLogger();
    const metrics = this.metrics ?? getMetrics();
    const startTime = Date.now();

    graph.transition('running');

    const status = new Map<NodeId, NodeStatus>();
    const remaining = new Map<NodeId, number>();
    const records = new Map<NodeId, NodeRecord>();
    const completed: NodeId[] = [];
    const skipped: NodeId[] = [];
    const failures: TaskFailure<GraphError>[] = [];
    const ready: NodeId[] = [];
    const inFlight = new Set<NodeId>();
    const settledQueue = new SettledQueue();

    for (const nodeId of graph.nodeIds()) {
      const count = graph.predecessors(nodeId).length;
      remaining.set(nodeId, count);
      status.set(nodeId, count === 0 ? 'ready' : 'pending');
      if (count === 0) {
        ready.push(nodeId);
      }
    }

    logger.runEvent('started', { nodes: graph.size(), maxParallel: this.maxParallel || 'unbounded' });

    try {
      while (ready.length > 0 || inFlight.size > 0) {
        for (const nodeId of this.takeDispatchable(graph, ready, inFlight.size)) {
          const task = graph.getTask(nodeId);
          if (!task) {
            throw new UnknownNodeError(nodeId);
          }
          status.set(nodeId, 'executing');
          inFlight.add(nodeId);
          void this.dispatch(task, nodeId, context).then((settled) => settledQueue.push(settled));
        }

        const settled = await settledQueue.next();
        inFlight.delete(settled.nodeId);
        const durationMs = settled.finishedAt.getTime() - settled.startedAt.getTime();

        if (!settled.error) {
          status.set(settled.nodeId, 'completed');
          completed.push(settled.nodeId);
          records.set(settled.nodeId, {
            nodeId: settled.nodeId,
            status: 'completed',
            startedAt: settled.startedAt,
            finishedAt: settled.finishedAt,
            durationMs,
          });
          metrics.completeTask(settled.nodeId, durationMs);
          logger.taskEvent('completed', settled.nodeId, { durationMs });

          for (const successorId of graph.successors(settled.nodeId)) {
            if (status.get(successorId) !== 'pending') continue;

            const left = (remaining.get(successorId) ?? 0) - 1;
            remaining.set(successorId, left);
            if (left === 0) {
              status.set(successorId, 'ready');
              ready.push(successorId);
            }
          }
          continue;
        }

        const executionError = settled.error.toExecutionError();
        status.set(settled.nodeId, 'failed');
        failures.push({ nodeId: settled.nodeId, error: settled.error });
        records.set(settled.nodeId, {
          nodeId: settled.nodeId,
          status: 'failed',
          startedAt: settled.startedAt,
          finishedAt: settled.finishedAt,
          durationMs,
          error: executionError,
        });
        metrics.failTask(settled.nodeId, durationMs, executionError);
        logger.taskEvent('failed', settled.nodeId, {
          code: executionError.code,
          error: executionError.message,
          durationMs,
        });

        for (const dependentId of graph.descendants(settled.nodeId)) {
          if (status.get(dependentId) !== 'pending') continue;

          status.set(dependentId, 'skipped');
          skipped.push(dependentId);
          records.set(dependentId, { nodeId: dependentId, status: 'skipped' });
          metrics.skipTask();
          logger.taskEvent('skipped', dependentId, { failedAncestor: settled.nodeId });
        }
      }

      const stranded = Array.from(status).filter(([, s]) => s === 'pending');
      if (stranded.length > 0) {
        throw new GraphStateError(
          `Run ended with undispatched nodes: ${stranded.map(([nodeId]) => nodeId).join(', ')}`
        );
      }
    } finally {
      graph.transition('finished');
    }

    const durationMs = Date.now() - startTime;
    const outcome: RunOutcome = { context, completed, records, durationMs };
    metrics.recordRun(failures.length === 0, durationMs);

    if (failures.length === 0) {
      logger.runEvent('succeeded', { completed: completed.length, durationMs });
      return { status: 'success', ...outcome };
    }

    const [first] = failures;
    logger.runEvent('failed', {
      failedNode: first.nodeId,
      error: first.error.message,
      completed: completed.length,
      failed: failures.length,
      skipped: skipped.length,
      durationMs,
    });

    return {
      status: 'failure',
      ...outcome,
      failedNode: first.nodeId,
      error: first.error,
      skipped,
      failures,
    };
  }

  /**
   * Remove and return the ready nodes that fit under the concurrency bound,
   * highest priority first when bounded. Non-finite priorities count as 0.
   */
  private takeDispatchable(graph: TaskGraph, ready: NodeId[], running: number): NodeId[] {
    if (this.maxParallel <= 0) {
      return ready.splice(0, ready.length);
    }

    const slots = this.maxParallel - running;
    if (slots <= 0) {
      return [];
    }

    const priorityOf = (nodeId: NodeId): number => {
      const priority = graph.getTask(nodeId)?.priority;
      return priority !== undefined && Number.isFinite(priority) ? priority : 0;
    };
    const ordered = [...ready].sort((a, b) => priorityOf(b) - priorityOf(a));
    const taken = ordered.slice(0, slots);

    for (const nodeId of taken) {
      ready.splice(ready.indexOf(nodeId), 1);
    }
    return taken;
  }

  private async dispatch(task: Task, nodeId: NodeId, context: Context): Promise<Settled> {
    const runnable = this.taskTimeoutMs > 0 ? withTimeout(task, this.taskTimeoutMs) : task;
    const startedAt = new Date();
    getLogger().taskEvent('started', nodeId);

    try {
      await runnable.run(context.withWriter(nodeId));
      return { nodeId, startedAt, finishedAt: new Date() };
    } catch (error) {
      return { nodeId, startedAt, finishedAt: new Date(), error: toGraphError(error) };
    }
  }
}
