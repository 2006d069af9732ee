import type { Logger } from "winston";
import { logger } from "@/monitoring/logger";
import { parseComponentConfig, rateLimiterConfigSchema } from "@/config/schemas";
import { systemClock, type Clock } from "@/utils/clock";
import { Semaphore } from "@/utils/semaphore";
import type { RateLimiterConfig, RateLimiterStats } from "@/types";
import { acquireOrCancel, sleepOrCancel } from "./suspension";

const DEFAULTS: RateLimiterConfig = {
  name: "default",
  requestsPerSecond: null,
  burstSize: 1,
};

/**
 * Windowed burst limiter: up to `burstSize` calls pass back to back, after
 * which calls are paced one interval (1000 / requestsPerSecond ms) apart.
 *
 * Async callers queue on a single-permit semaphore for the whole
 * check-wait-commit sequence. State is only written once a caller is admitted,
 * so a caller cancelled while waiting leaves nothing behind.
 */
export class RateLimiter {
  readonly config: Readonly<RateLimiterConfig>;

  private lastRequestTime: number | null = null;
  private burstCount = 0;
  private totalRequests = 0;
  private totalThrottled = 0;
  private totalWaitTime = 0;
  private readonly turn = new Semaphore(1);
  private readonly log: Logger;

  constructor(
    options: Partial<RateLimiterConfig> = {},
    private readonly clock: Clock = systemClock
  ) {
    const merged = { ...DEFAULTS, ...options };
    this.config = Object.freeze({
      ...merged,
      ...parseComponentConfig("rate limiter", rateLimiterConfigSchema, merged),
    });
    this.log = logger.child({
      component: "rate-limiter",
      resource: this.config.name,
    });
  }

  get enabled(): boolean {
    return this.config.requestsPerSecond !== null;
  }

  async throttle<T>(
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    if (this.enabled) {
      await this.waitForTurn(signal);
    }
    return operation();
  }

  throttleSync<T>(operation: () => T): T {
    if (this.enabled) {
      let wait = this.tryAdmit();
      if (wait > 0) this.noteThrottled();
      while (wait > 0) {
        this.noteWait(wait);
        this.clock.sleepSync(wait);
        wait = this.tryAdmit();
      }
    }
    return operation();
  }

  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>
  ): (...args: A) => Promise<R> {
    return (...args: A) => this.throttle(() => fn(...args));
  }

  private async waitForTurn(signal?: AbortSignal): Promise<void> {
    await acquireOrCancel(this.turn, "rate-limit", undefined, signal);
    try {
      let wait = this.tryAdmit();
      if (wait > 0) this.noteThrottled();
      // Re-checked after every sleep: a sync caller may have been admitted meanwhile
      while (wait > 0) {
        this.noteWait(wait);
        await sleepOrCancel(this.clock, wait, "rate-limit", signal);
        wait = this.tryAdmit();
      }
    } finally {
      this.turn.release();
    }
  }

  /**
   * Admits the caller and returns 0, or returns how long it still has to wait.
   * Nothing that outlives the call is written unless the caller is admitted.
   */
  private tryAdmit(): number {
    const now = this.clock.now();
    const interval = this.interval;
    const elapsed =
      this.lastRequestTime === null ? Infinity : now - this.lastRequestTime;

    if (elapsed >= interval) {
      this.burstCount = 0;
    }

    if (this.burstCount >= this.config.burstSize) {
      const wait = interval - elapsed;
      if (wait > 0) {
        return wait;
      }
      this.burstCount = 0;
    }

    this.burstCount++;
    this.lastRequestTime = now;
    this.totalRequests++;
    return 0;
  }

  private get interval(): number {
    return this.config.requestsPerSecond === null
      ? 0
      : 1000 / this.config.requestsPerSecond;
  }

  private noteThrottled(): void {
    this.totalThrottled++;
  }

  private noteWait(wait: number): void {
    this.totalWaitTime += wait;
    this.log.debug(`Rate limit reached, waiting ${Math.round(wait)}ms`, {
      burstSize: this.config.burstSize,
      requestsPerSecond: this.config.requestsPerSecond,
    });
  }

  getStats(): RateLimiterStats {
    return {
      name: this.config.name,
      enabled: this.enabled,
      requestsPerSecond: this.config.requestsPerSecond,
      burstSize: this.config.burstSize,
      burstCount: this.burstCount,
      lastRequestTime: this.lastRequestTime,
      totalRequests: this.totalRequests,
      totalThrottled: this.totalThrottled,
      totalWaitTime: this.totalWaitTime,
    };
  }
}
