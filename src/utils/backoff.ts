/**
 * Exponential backoff with jitter, used for retrying outbound calls and tasks
 */

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetries: number;
  jitterFactor: number; // 0-1, share of the delay randomized either way
}

const DEFAULT_CONFIG: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxRetries: 3,
  jitterFactor: 0.1,
};

export type RetryListener = (error: unknown, attempt: number, delayMs: number) => void;

export class ExponentialBackoff {
  private config: BackoffConfig;
  private retries = 0;

  constructor(config: Partial<BackoffConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Delay before the next retry: base * 2^retries, capped, then jittered
   */
  getDelay(): number {
    const { baseDelayMs, maxDelayMs, jitterFactor } = this.config;
    const capped = Math.min(baseDelayMs * 2 ** this.retries, maxDelayMs);
    const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
    return Math.max(0, capped + jitter);
  }

  /**
   * Consume one retry and return its delay
   */
  nextDelay(): number {
    const delay = this.getDelay();
    this.retries++;
    return delay;
  }

  canRetry(): boolean {
    return this.retries < this.config.maxRetries;
  }

  reset(): void {
    this.retries = 0;
  }

  /**
   * Run `fn`, retrying while `shouldRetry` accepts the error and retries remain
   */
  async execute<T>(
    fn: () => Promise<T>,
    shouldRetry: (error: unknown) => boolean,
    onRetry?: RetryListener
  ): Promise<T> {
    for (;;) {
      try {
        const result = await fn();
        this.reset();
        return result;
      } catch (error) {
        if (!shouldRetry(error) || !this.canRetry()) {
          throw error;
        }

        const delay = this.nextDelay();
        onRetry?.(error, this.retries, delay);
        await sleep(delay);
      }
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
