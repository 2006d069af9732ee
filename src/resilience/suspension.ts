import type { Clock } from "@/utils/clock";
import type { Semaphore } from "@/utils/semaphore";
import { OperationCancelledError } from "./errors";

type Stage = OperationCancelledError["stage"];

export const sleepOrCancel = async (
  clock: Clock,
  ms: number,
  stage: Stage,
  signal?: AbortSignal
): Promise<void> => {
  if (signal?.aborted) {
    throw new OperationCancelledError(stage, signal.reason);
  }
  try {
    await clock.sleep(ms, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw new OperationCancelledError(stage, signal.reason);
    }
    throw error;
  }
};

export const acquireOrCancel = async (
  semaphore: Semaphore,
  stage: Stage,
  timeoutMs: number | undefined,
  signal?: AbortSignal
): Promise<boolean> => {
  if (signal?.aborted) {
    throw new OperationCancelledError(stage, signal.reason);
  }
  try {
    return await semaphore.acquire(timeoutMs, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw new OperationCancelledError(stage, signal.reason);
    }
    throw error;
  }
};
