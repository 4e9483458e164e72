/**
 * Core types and interfaces for the task-graph engine and the answer service
 */

// ============================================================================
// Task & Execution Types
// ============================================================================

export type NodeId = string;

export type NodeStatus = 'pending' | 'ready' | 'executing' | 'completed' | 'failed' | 'skipped';

export type GraphState = 'building' | 'running' | 'finished';

/**
 * Serializable description of a failure, used in logs, metrics and records
 */
export interface ExecutionError {
  code: string;
  message: string;
  retryable: boolean;
  context?: Record<string, unknown>;
}

export interface NodeRecord {
  nodeId: NodeId;
  status: 'completed' | 'failed' | 'skipped';
  startedAt?: Date;
  finishedAt?: Date;
  durationMs?: number;
  error?: ExecutionError;
}

export interface TaskFailure<E> {
  nodeId: NodeId;
  error: E;
}

// ============================================================================
// DAG Types
// ============================================================================

export interface TaskNode {
  nodeId: NodeId;
  dependencies: Set<NodeId>;
  dependents: Set<NodeId>;
}

export interface Edge {
  from: NodeId;
  to: NodeId;
}

// ============================================================================
// Metrics Types
// ============================================================================

export interface TaskTiming {
  count: number;
  totalDurationMs: number;
  maxDurationMs: number;
}

export interface MetricsSummary {
  totalRuns: number;
  succeededRuns: number;
  failedRuns: number;
  completedTasks: number;
  failedTasks: number;
  skippedTasks: number;
  averageRunDurationMs: number;
  uptimeMs: number;
  taskTimings: Record<string, TaskTiming>;
  recentErrors: Array<{ nodeId: NodeId; error: ExecutionError }>;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface Config {
  server: ServerConfig;
  llm: LlmConfig;
  search: SearchConfig;
  scraper: ScraperConfig;
  execution: ExecutionConfig;
  logging: LoggingConfig;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface LlmConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  maxRetries: number;
  apiKey?: string;
}

export interface SearchConfig {
  endpoint: string;
  site: string;
  resultCount: number;
  recency: string;
  apiKey?: string;
}

export interface ScraperConfig {
  timeoutMs: number;
  politenessDelayMs: number;
  minContentLength: number;
  userAgent: string;
}

export interface ExecutionConfig {
  /** 0 means unbounded */
  maxParallel: number;
  /** 0 disables the per-task timeout */
  taskTimeoutMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  file?: string;
  console: boolean;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

/**
 * Partial overrides layered on top of the defaults, one section at a time
 */
export type ConfigPatch = { [K in keyof Config]?: Partial<Config[K]> };

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  config?: string;
  host?: string;
  port?: number;
  maxParallel?: number;
  verbose: boolean;
}

// ============================================================================
// Search Types
// ============================================================================

export interface OrganicResult {
  title: string;
  link: string;
  snippet: string;
  position: number;
  date?: string;
}

export interface SearchResponse {
  searchParameters: {
    q: string;
    type: string;
    engine: string;
  };
  organic: OrganicResult[];
}
