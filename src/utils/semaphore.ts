interface Waiter {
  grant: () => void;
}

/**
 * FIFO counting semaphore for cooperative tasks.
 *
 * A released permit is handed straight to the oldest waiter, so a caller that
 * arrives later cannot overtake one that is already queued.
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.permits = capacity;
  }

  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      return true;
    }
    return false;
  }

  /**
   * Resolves true once a permit is held, false when `timeoutMs` elapses first.
   * Without a timeout it waits indefinitely. Rejects with the signal's reason
   * when aborted while queued; no permit is held in that case.
   */
  acquire(timeoutMs?: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.tryAcquire()) {
      return Promise.resolve(true);
    }
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const dequeue = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
      };

      const onAbort = () => {
        dequeue();
        cleanup();
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        grant: () => {
          cleanup();
          resolve(true);
        },
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          dequeue();
          cleanup();
          resolve(false);
        }, timeoutMs);
      }

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant();
      return;
    }
    if (this.permits < this.capacity) {
      this.permits++;
    }
  }

  get available(): number {
    return this.permits;
  }

  get inUse(): number {
    return this.capacity - this.permits;
  }

  get waiting(): number {
    return this.waiters.length;
  }
}
