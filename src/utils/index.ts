/**
 * Utility modules export
 */

export { Logger, initLogger, getLogger } from './logger';
export type { LogContext, LoggerConfig } from './logger';
export { MetricsCollector, getMetrics, resetMetrics } from './metrics';
export { ExponentialBackoff, sleep } from './backoff';
export type { BackoffConfig, RetryListener } from './backoff';
