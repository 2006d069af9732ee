import type { Logger } from "winston";
import { logger } from "@/monitoring/logger";
import { bulkheadConfigSchema, parseComponentConfig } from "@/config/schemas";
import { Semaphore } from "@/utils/semaphore";
import type { BulkheadConfig, BulkheadStats } from "@/types";
import { BulkheadRejectedError, OperationCancelledError } from "./errors";
import { acquireOrCancel } from "./suspension";

const DEFAULTS: BulkheadConfig = {
  name: "default",
  enabled: true,
  maxConcurrent: null,
  acquireTimeout: 0,
};

export class Bulkhead {
  readonly config: Readonly<BulkheadConfig>;

  private readonly permits: Semaphore | null;
  private totalExecuted = 0;
  private totalRejected = 0;
  private readonly log: Logger;

  constructor(options: Partial<BulkheadConfig> = {}) {
    const merged = { ...DEFAULTS, ...options };
    this.config = Object.freeze({
      ...merged,
      ...parseComponentConfig("bulkhead", bulkheadConfigSchema, merged),
    });

    const { enabled, maxConcurrent } = this.config;
    // maxConcurrent of null or below 1 is unbounded, never "admit nobody"
    this.permits =
      enabled && maxConcurrent !== null && maxConcurrent > 0
        ? new Semaphore(maxConcurrent)
        : null;

    this.log = logger.child({ component: "bulkhead", resource: this.config.name });
  }

  get bounded(): boolean {
    return this.permits !== null;
  }

  async execute<T>(
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    const permits = this.permits;
    if (!permits) {
      return operation();
    }

    // With no timeout the permit is taken synchronously, before any await
    const acquired =
      this.config.acquireTimeout > 0
        ? await acquireOrCancel(permits, "bulkhead", this.config.acquireTimeout, signal)
        : this.tryAcquire(permits, signal);

    if (!acquired) {
      throw this.reject();
    }

    this.totalExecuted++;
    try {
      return await operation();
    } finally {
      permits.release();
    }
  }

  // A blocked thread could never see a permit come back, so this never waits
  executeSync<T>(operation: () => T): T {
    const permits = this.permits;
    if (!permits) {
      return operation();
    }

    if (!permits.tryAcquire()) {
      throw this.reject();
    }

    this.totalExecuted++;
    try {
      return operation();
    } finally {
      permits.release();
    }
  }

  wrap<A extends unknown[], R>(
    fn: (...args: A) => Promise<R>
  ): (...args: A) => Promise<R> {
    return (...args: A) => this.execute(() => fn(...args));
  }

  private tryAcquire(permits: Semaphore, signal?: AbortSignal): boolean {
    if (signal?.aborted) {
      throw new OperationCancelledError("bulkhead", signal.reason);
    }
    return permits.tryAcquire();
  }

  private reject(): BulkheadRejectedError {
    this.totalRejected++;
    const maxConcurrent = this.config.maxConcurrent ?? 0;
    this.log.warn("Bulkhead capacity reached, rejecting call", {
      maxConcurrent,
      acquireTimeout: this.config.acquireTimeout,
      totalRejected: this.totalRejected,
    });
    return new BulkheadRejectedError(
      this.config.name,
      maxConcurrent,
      this.config.acquireTimeout
    );
  }

  getStats(): BulkheadStats {
    return {
      name: this.config.name,
      bounded: this.bounded,
      maxConcurrent: this.config.maxConcurrent,
      active: this.permits?.inUse ?? 0,
      waiting: this.permits?.waiting ?? 0,
      available: this.permits?.available ?? null,
      totalExecuted: this.totalExecuted,
      totalRejected: this.totalRejected,
    };
  }
}
