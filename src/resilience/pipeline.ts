import { logger } from "@/monitoring/logger";
import { systemClock, type Clock } from "@/utils/clock";
import { generateCorrelationId } from "@/utils/idGenerator";
import type { ResiliencePolicy, ResilienceStats } from "@/types";
import { Bulkhead } from "./bulkhead";
import { CircuitBreaker } from "./circuitBreaker";
import { RateLimiter } from "./rateLimiter";
import { RetryPolicy } from "./retryPolicy";

export interface ExecuteOptions {
  signal?: AbortSignal;
  correlationId?: string;
}

/**
 * Composes the four protections around one resource in the fixed order
 * CircuitBreaker -> RetryPolicy -> RateLimiter -> Bulkhead -> operation.
 *
 * The breaker sees one outcome per call, after retries. Every physical attempt
 * goes through the rate limiter and the bulkhead. A component is only built
 * when the policy names it.
 */
export class ResiliencePipeline {
  readonly circuitBreaker: CircuitBreaker | null;
  readonly retryPolicy: RetryPolicy | null;
  readonly rateLimiter: RateLimiter | null;
  readonly bulkhead: Bulkhead | null;

  constructor(
    readonly name: string,
    policy: ResiliencePolicy = {},
    clock: Clock = systemClock
  ) {
    this.circuitBreaker = policy.circuitBreaker
      ? new CircuitBreaker({ ...policy.circuitBreaker, name }, clock)
      : null;
    this.retryPolicy = policy.retry
      ? new RetryPolicy({ ...policy.retry, name }, clock)
      : null;
    this.rateLimiter = policy.rateLimiter
      ? new RateLimiter({ ...policy.rateLimiter, name }, clock)
      : null;
    this.bulkhead = policy.bulkhead
      ? new Bulkhead({ ...policy.bulkhead, name })
      : null;
  }

  async execute<T>(
    operation: () => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const { circuitBreaker, retryPolicy, rateLimiter, bulkhead } = this;
    const { signal } = options;
    const contextLogger = logger.child({
      correlationId: options.correlationId ?? generateCorrelationId(),
      resource: this.name,
    });

    const guarded = bulkhead
      ? () => bulkhead.execute(operation, signal)
      : operation;
    const attempt = rateLimiter
      ? () => rateLimiter.throttle(guarded, signal)
      : guarded;
    const retried = retryPolicy
      ? () => retryPolicy.execute(attempt, signal)
      : attempt;

    contextLogger.debug("Protected call started");

    try {
      const result = circuitBreaker
        ? await circuitBreaker.execute(retried)
        : await retried();
      contextLogger.debug("Protected call completed");
      return result;
    } catch (error) {
      contextLogger.warn("Protected call failed", {
        error: error instanceof Error ? error.message : error,
      });
      throw error;
    }
  }

  executeSync<T>(operation: () => T): T {
    const { circuitBreaker, retryPolicy, rateLimiter, bulkhead } = this;

    const guarded = bulkhead ? () => bulkhead.executeSync(operation) : operation;
    const attempt = rateLimiter
      ? () => rateLimiter.throttleSync(guarded)
      : guarded;
    const retried = retryPolicy
      ? () => retryPolicy.executeSync(attempt)
      : attempt;

    return circuitBreaker ? circuitBreaker.executeSync(retried) : retried();
  }

  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>,
    options: ExecuteOptions = {}
  ): (...args: A) => Promise<R> {
    return (...args: A) => this.execute(() => fn(...args), options);
  }

  getStats(): ResilienceStats {
    return {
      name: this.name,
      circuitBreaker: this.circuitBreaker?.getStats() ?? null,
      rateLimiter: this.rateLimiter?.getStats() ?? null,
      bulkhead: this.bulkhead?.getStats() ?? null,
    };
  }
}
