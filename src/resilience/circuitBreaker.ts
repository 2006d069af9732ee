import type { Logger } from "winston";
import { logger } from "@/monitoring/logger";
import { circuitBreakerConfigSchema, parseComponentConfig } from "@/config/schemas";
import { systemClock, type Clock } from "@/utils/clock";
import {
  CIRCUIT_STATE,
  type CallOutcome,
  type CircuitBreakerConfig,
  type CircuitBreakerStats,
  type CircuitState,
} from "@/types";
import { defaultFailureClassifier } from "./classifiers";
import { CircuitOpenError, isNeutral } from "./errors";

const DEFAULTS: CircuitBreakerConfig = {
  name: "default",
  enabled: true,
  failureThreshold: 5,
  recoveryTimeout: 60000,
  successThreshold: 2,
};

/**
 * Circuit breaker shared by every caller of one protected resource.
 *
 * Admission (including the OPEN -> HALF_OPEN probe transition) and outcome
 * recording are synchronous, so no other caller can interleave between a
 * state read and the write that depends on it.
 */
export class CircuitBreaker {
  readonly config: Readonly<CircuitBreakerConfig>;

  private state: CircuitState = CIRCUIT_STATE.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private totalCalls = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private totalRejected = 0;
  private readonly log: Logger;

  constructor(
    options: Partial<CircuitBreakerConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    const merged = { ...DEFAULTS, ...options };
    this.config = Object.freeze({
      ...merged,
      ...parseComponentConfig("circuit breaker", circuitBreakerConfigSchema, merged),
    });
    this.log = logger.child({
      component: "circuit-breaker",
      resource: this.config.name,
    });
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (!this.config.enabled) {
      return operation();
    }

    this.admit();

    let result: Awaited<T>;
    try {
      result = await operation();
    } catch (error) {
      this.record({ kind: "error", error });
      throw error;
    }
    this.record({ kind: "result", value: result });
    return result;
  }

  executeSync<T>(operation: () => T): T {
    if (!this.config.enabled) {
      return operation();
    }

    this.admit();

    let result: T;
    try {
      result = operation();
    } catch (error) {
      this.record({ kind: "error", error });
      throw error;
    }
    this.record({ kind: "result", value: result });
    return result;
  }

  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>
  ): (...args: A) => Promise<R> {
    return (...args: A) => this.execute(() => fn(...args));
  }

  private admit(): void {
    this.totalCalls++;

    if (this.state !== CIRCUIT_STATE.OPEN) {
      return;
    }

    const elapsed = this.clock.now() - (this.lastFailureTime ?? 0);
    if (elapsed < this.config.recoveryTimeout) {
      this.totalRejected++;
      const retryAfter = this.config.recoveryTimeout - elapsed;
      this.log.warn("Circuit breaker: OPEN - call rejected", {
        retryAfter,
        totalRejected: this.totalRejected,
      });
      throw new CircuitOpenError(this.config.name, this.state, retryAfter);
    }

    this.transitionTo(CIRCUIT_STATE.HALF_OPEN);
  }

  private record(outcome: CallOutcome): void {
    // Inner rejections and caller cancellations are neither failures nor successes
    if (outcome.kind === "error" && isNeutral(outcome.error)) {
      this.log.debug("Circuit breaker: neutral outcome ignored", {
        error: outcome.error.message,
      });
      return;
    }

    const classify = this.config.failureClassifier ?? defaultFailureClassifier;
    if (classify(outcome)) {
      this.onFailure(outcome);
    } else {
      this.onSuccess();
    }
  }

  private onSuccess(): void {
    this.lastSuccessTime = this.clock.now();
    this.totalSuccesses++;

    if (this.state === CIRCUIT_STATE.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.transitionTo(CIRCUIT_STATE.CLOSED);
      }
    } else if (this.state === CIRCUIT_STATE.CLOSED) {
      this.failureCount = 0;
    }
  }

  private onFailure(outcome: CallOutcome): void {
    this.lastFailureTime = this.clock.now();
    this.failureCount++;
    this.totalFailures++;

    this.log.warn("Circuit breaker: failure recorded", {
      failureCount: this.failureCount,
      error:
        outcome.kind === "error"
          ? outcome.error instanceof Error
            ? outcome.error.message
            : outcome.error
          : "result classified as failure",
    });

    if (this.state === CIRCUIT_STATE.HALF_OPEN) {
      this.transitionTo(CIRCUIT_STATE.OPEN);
    } else if (
      this.state === CIRCUIT_STATE.CLOSED &&
      this.failureCount >= this.config.failureThreshold
    ) {
      this.transitionTo(CIRCUIT_STATE.OPEN);
    }
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    if (previous === next) {
      return;
    }

    this.state = next;
    if (next === CIRCUIT_STATE.CLOSED) {
      this.failureCount = 0;
      this.successCount = 0;
    } else if (next === CIRCUIT_STATE.HALF_OPEN) {
      this.successCount = 0;
    }

    if (next === CIRCUIT_STATE.OPEN) {
      this.log.warn(`Circuit breaker: OPEN - ${this.failureCount} failures`, {
        from: previous,
      });
    } else {
      this.log.info(`Circuit breaker: ${next}`, { from: previous });
    }

    try {
      this.config.onStateChange?.(previous, next);
    } catch (error) {
      this.log.error("Circuit breaker: state change listener failed", {
        error: error instanceof Error ? error.message : error,
      });
    }
  }

  reset(): void {
    this.failureCount = 0;
    this.successCount = 0;
    this.transitionTo(CIRCUIT_STATE.CLOSED);
    this.log.info("Circuit breaker manually reset to CLOSED");
  }

  // The recovery window starts now, as if a failure had just been recorded
  forceOpen(): void {
    this.lastFailureTime = this.clock.now();
    this.transitionTo(CIRCUIT_STATE.OPEN);
    this.log.info("Circuit breaker manually forced OPEN");
  }

  getState(): CircuitState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === CIRCUIT_STATE.OPEN;
  }

  isClosed(): boolean {
    return this.state === CIRCUIT_STATE.CLOSED;
  }

  isHalfOpen(): boolean {
    return this.state === CIRCUIT_STATE.HALF_OPEN;
  }

  getStats(): CircuitBreakerStats {
    const calls = Math.max(this.totalCalls, 1);
    return {
      name: this.config.name,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
      totalRejected: this.totalRejected,
      failureRate: this.totalFailures / calls,
      successRate: this.totalSuccesses / calls,
    };
  }
}
