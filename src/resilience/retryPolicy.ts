import type { Logger } from "winston";
import { logger } from "@/monitoring/logger";
import { parseComponentConfig, retryConfigSchema } from "@/config/schemas";
import { systemClock, type Clock } from "@/utils/clock";
import type { RetryAttempt, RetryConfig } from "@/types";
import { defaultRetryableError } from "./classifiers";
import { sleepOrCancel } from "./suspension";

const DEFAULTS: RetryConfig = {
  name: "default",
  maxRetries: 3,
  baseDelay: 1000,
  backoffFactor: 2,
  maxDelay: 30000,
  jitter: false,
};

// Jitter widens a delay by at most this fraction
export const JITTER_RATIO = 0.25;

/**
 * Re-invokes an operation with exponential backoff.
 *
 * Holds no state between calls; both entry points share the decision logic in
 * `afterResult` / `afterError` and differ only in how they wait.
 */
export class RetryPolicy {
  readonly config: Readonly<RetryConfig>;
  private readonly log: Logger;

  constructor(
    options: Partial<RetryConfig> = {},
    private readonly clock: Clock = systemClock,
    private readonly random: () => number = Math.random
  ) {
    const merged = { ...DEFAULTS, ...options };
    this.config = Object.freeze({
      ...merged,
      ...parseComponentConfig("retry", retryConfigSchema, merged),
    });
    this.log = logger.child({ component: "retry", resource: this.config.name });
  }

  async execute<T>(
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      let result: Awaited<T>;
      try {
        result = await operation();
      } catch (error) {
        const delay = this.afterError(attempt, error);
        if (delay === null) throw error;
        await sleepOrCancel(this.clock, delay, "retry", signal);
        continue;
      }

      const delay = this.afterResult(attempt, result);
      if (delay === null) return result;
      await sleepOrCancel(this.clock, delay, "retry", signal);
    }
  }

  executeSync<T>(operation: () => T): T {
    for (let attempt = 0; ; attempt++) {
      let result: T;
      try {
        result = operation();
      } catch (error) {
        const delay = this.afterError(attempt, error);
        if (delay === null) throw error;
        this.clock.sleepSync(delay);
        continue;
      }

      const delay = this.afterResult(attempt, result);
      if (delay === null) return result;
      this.clock.sleepSync(delay);
    }
  }

  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>
  ): (...args: A) => Promise<R> {
    return (...args: A) => this.execute(() => fn(...args));
  }

  /**
   * min(baseDelay * backoffFactor^attempt, maxDelay), widened by up to 25%
   * when jitter is on and still capped at maxDelay.
   */
  getDelay(attempt: number): number {
    const { baseDelay, backoffFactor, maxDelay, jitter } = this.config;
    const delay = Math.min(baseDelay * Math.pow(backoffFactor, attempt), maxDelay);

    if (!jitter) {
      return delay;
    }
    return Math.min(delay + delay * JITTER_RATIO * this.random(), maxDelay);
  }

  // Returns the delay before the next attempt, or null to hand back the result
  private afterResult(attempt: number, result: unknown): number | null {
    const retryable = this.config.retryableResult?.(result) ?? false;
    if (!retryable || attempt >= this.config.maxRetries) {
      return null;
    }

    const delay = this.getDelay(attempt);
    this.announce({ attempt, delay, reason: "result", result });
    return delay;
  }

  // Returns the delay before the next attempt, or null to rethrow
  private afterError(attempt: number, error: unknown): number | null {
    const classify = this.config.retryableError ?? defaultRetryableError;
    if (!classify(error)) {
      return null;
    }

    if (attempt >= this.config.maxRetries) {
      this.log.error(`Operation failed after ${attempt + 1} attempts`, {
        error: error instanceof Error ? error.message : error,
      });
      return null;
    }

    const delay = this.getDelay(attempt);
    this.announce({ attempt, delay, reason: "error", error });
    return delay;
  }

  private announce(event: RetryAttempt): void {
    this.log.warn(`Retrying after ${Math.round(event.delay)}ms`, {
      attempt: event.attempt + 1,
      maxRetries: this.config.maxRetries,
      reason:
        event.reason === "error"
          ? event.error instanceof Error
            ? event.error.message
            : String(event.error)
          : "retryable result",
    });

    try {
      this.config.onRetry?.(event);
    } catch (error) {
      this.log.error("Retry listener failed", {
        error: error instanceof Error ? error.message : error,
      });
    }
  }
}

export const withRetry = <T>(
  operation: () => Promise<T>,
  options: Partial<RetryConfig> = {},
  signal?: AbortSignal
): Promise<T> => new RetryPolicy(options).execute(operation, signal);
