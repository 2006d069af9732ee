// Time source and suspension strategy shared by the sync and async code paths
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
  /** Blocks the calling thread; only used by the sync entry points */
  sleepSync(ms: number): void;
}

const sleepCell = new Int32Array(new SharedArrayBuffer(4));

export const systemClock: Clock = {
  now: () => Date.now(),

  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, Math.max(0, ms));

      signal?.addEventListener("abort", onAbort, { once: true });
    }),

  sleepSync: (ms) => {
    if (ms > 0) {
      Atomics.wait(sleepCell, 0, 0, ms);
    }
  },
};
