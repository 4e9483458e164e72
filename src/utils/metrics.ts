/**
 * Process-wide run and task metrics
 */

import type { ExecutionError, MetricsSummary, NodeId, TaskTiming } from '../types';

const MAX_RECENT_ERRORS = 20;

interface GlobalMetrics {
  startTime: number;
  totalRuns: number;
  succeededRuns: number;
  failedRuns: number;
  totalRunDurationMs: number;
  completedTasks: number;
  failedTasks: number;
  skippedTasks: number;
  taskTimings: Map<string, TaskTiming>;
  recentErrors: Array<{ nodeId: NodeId; error: ExecutionError }>;
}

function emptyMetrics(): GlobalMetrics {
  return {
    startTime: Date.now(),
    totalRuns: 0,
    succeededRuns: 0,
    failedRuns: 0,
    totalRunDurationMs: 0,
    completedTasks: 0,
    failedTasks: 0,
    skippedTasks: 0,
    taskTimings: new Map(),
    recentErrors: [],
  };
}

class MetricsCollector {
  private metrics: GlobalMetrics;

  constructor() {
    this.metrics = emptyMetrics();
  }

  /**
   * Record successful task completion
   */
  completeTask(nodeId: NodeId, durationMs: number): void {
    this.metrics.completedTasks++;
    this.recordTiming(nodeId, durationMs);
  }

  /**
   * Record task failure
   */
  failTask(nodeId: NodeId, durationMs: number, error: ExecutionError): void {
    this.metrics.failedTasks++;
    this.recordTiming(nodeId, durationMs);

    this.metrics.recentErrors.push({ nodeId, error });
    if (this.metrics.recentErrors.length > MAX_RECENT_ERRORS) {
      this.metrics.recentErrors.shift();
    }
  }

  skipTask(): void {
    this.metrics.skippedTasks++;
  }

  /**
   * Record the end of a graph run
   */
  recordRun(succeeded: boolean, durationMs: number): void {
    this.metrics.totalRuns++;
    this.metrics.totalRunDurationMs += durationMs;
    if (succeeded) {
      this.metrics.succeededRuns++;
    } else {
      this.metrics.failedRuns++;
    }
  }

  getTaskTiming(nodeId: NodeId): TaskTiming | undefined {
    const timing = this.metrics.taskTimings.get(nodeId);
    return timing ? { ...timing } : undefined;
  }

  /**
   * Get total uptime in milliseconds
   */
  getTotalDuration(): number {
    return Date.now() - this.metrics.startTime;
  }

  generateSummary(): MetricsSummary {
    const { totalRuns, totalRunDurationMs } = this.metrics;

    return {
      totalRuns,
      succeededRuns: this.metrics.succeededRuns,
      failedRuns: this.metrics.failedRuns,
      completedTasks: this.metrics.completedTasks,
      failedTasks: this.metrics.failedTasks,
      skippedTasks: this.metrics.skippedTasks,
      averageRunDurationMs: totalRuns === 0 ? 0 : totalRunDurationMs / totalRuns,
      uptimeMs: this.getTotalDuration(),
      taskTimings: Object.fromEntries(
        Array.from(this.metrics.taskTimings, ([nodeId, timing]) => [nodeId, { ...timing }])
      ),
      recentErrors: [...this.metrics.recentErrors],
    };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }

  private recordTiming(nodeId: NodeId, durationMs: number): void {
    const timing = this.metrics.taskTimings.get(nodeId) ?? {
      count: 0,
      totalDurationMs: 0,
      maxDurationMs: 0,
    };
    timing.count++;
    timing.totalDurationMs += durationMs;
    timing.maxDurationMs = Math.max(timing.maxDurationMs, durationMs);
    this.metrics.taskTimings.set(nodeId, timing);
  }
}

// Global metrics instance
let metricsCollector: MetricsCollector | null = null;

/**
 * Get the global metrics collector
 */
export function getMetrics(): MetricsCollector {
  if (!metricsCollector) {
    metricsCollector = new MetricsCollector();
  }
  return metricsCollector;
}

/**
 * Reset the global metrics collector
 */
export function resetMetrics(): void {
  metricsCollector = new MetricsCollector();
}

export { MetricsCollector };
