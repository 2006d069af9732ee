import { RetryPolicy, withRetry } from "../src/resilience/retryPolicy";
import {
  CircuitOpenError,
  OperationCancelledError,
  ResilienceConfigError,
} from "../src/resilience/errors";
import { retryOnStatusCodes } from "../src/resilience/classifiers";
import type { RetryAttempt } from "../src/types";
import { createTestClock } from "./helpers/testClock";

// Mock the logger to avoid console output during tests
jest.mock("../src/monitoring/logger", () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(() => ({
      info: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    })),
  },
}));

describe("RetryPolicy", () => {
  it("should return the first successful result", async () => {
    const clock = createTestClock();
    const policy = new RetryPolicy({ maxRetries: 3, baseDelay: 100 }, clock);

    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("ok");

    await expect(policy.execute(operation)).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("should rethrow the last error once retries are exhausted", async () => {
    const clock = createTestClock();
    const policy = new RetryPolicy({ maxRetries: 2, baseDelay: 100 }, clock);
    const operation = jest.fn().mockRejectedValue(new Error("unavailable"));

    await expect(policy.execute(operation)).rejects.toThrow("unavailable");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("should call the operation once when maxRetries is 0", async () => {
    const policy = new RetryPolicy({ maxRetries: 0 }, createTestClock());
    const operation = jest.fn().mockRejectedValue(new Error("unavailable"));

    await expect(policy.execute(operation)).rejects.toThrow("unavailable");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should cap the backoff at maxDelay", () => {
    const policy = new RetryPolicy({
      baseDelay: 100,
      backoffFactor: 10,
      maxDelay: 500,
    });

    expect(policy.getDelay(0)).toBe(100);
    expect(policy.getDelay(1)).toBe(500);
    expect(policy.getDelay(4)).toBe(500);
  });

  it("should add up to 25% jitter without exceeding maxDelay", () => {
    const highest = new RetryPolicy(
      { baseDelay: 100, maxDelay: 1000, jitter: true },
      createTestClock(),
      () => 1
    );
    const lowest = new RetryPolicy(
      { baseDelay: 100, maxDelay: 1000, jitter: true },
      createTestClock(),
      () => 0
    );
    const capped = new RetryPolicy(
      { baseDelay: 100, maxDelay: 110, jitter: true },
      createTestClock(),
      () => 1
    );

    expect(highest.getDelay(0)).toBe(125);
    expect(lowest.getDelay(0)).toBe(100);
    expect(capped.getDelay(0)).toBe(110);
  });

  it("should not retry errors the classifier rejects", async () => {
    const clock = createTestClock();
    const policy = new RetryPolicy(
      {
        maxRetries: 3,
        retryableError: (error) => !(error instanceof TypeError),
      },
      clock
    );
    const operation = jest.fn().mockRejectedValue(new TypeError("bad input"));

    await expect(policy.execute(operation)).rejects.toThrow("bad input");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("should not retry a circuit-open rejection by default", async () => {
    const policy = new RetryPolicy({ maxRetries: 3 }, createTestClock());
    const operation = jest
      .fn()
      .mockRejectedValue(new CircuitOpenError("payments", "OPEN", 500));

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(
      CircuitOpenError
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should retry results matched by retryableResult", async () => {
    const clock = createTestClock();
    const policy = new RetryPolicy(
      { maxRetries: 3, baseDelay: 50, retryableResult: retryOnStatusCodes() },
      clock
    );
    const operation = jest
      .fn()
      .mockResolvedValueOnce({ status: 503 })
      .mockResolvedValueOnce({ status: 200 });

    await expect(policy.execute(operation)).resolves.toEqual({ status: 200 });
    expect(operation).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([50]);
  });

  it("should return the last retryable result once retries are exhausted", async () => {
    const policy = new RetryPolicy(
      { maxRetries: 1, baseDelay: 50, retryableResult: retryOnStatusCodes() },
      createTestClock()
    );
    const operation = jest.fn().mockResolvedValue({ status: 429 });

    await expect(policy.execute(operation)).resolves.toEqual({ status: 429 });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("should never retry results without a retryableResult predicate", async () => {
    const policy = new RetryPolicy({ maxRetries: 3 }, createTestClock());
    const operation = jest.fn().mockResolvedValue({ status: 503 });

    await expect(policy.execute(operation)).resolves.toEqual({ status: 503 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should not treat a throwing result classifier as an operation error", async () => {
    const clock = createTestClock();
    const classifierError = new Error("classifier broke");
    const policy = new RetryPolicy(
      {
        maxRetries: 3,
        retryableResult: () => {
          throw classifierError;
        },
      },
      clock
    );
    const operation = jest.fn().mockResolvedValue({ status: 200 });

    await expect(policy.execute(operation)).rejects.toBe(classifierError);
    expect(() => policy.executeSync(() => "value")).toThrow("classifier broke");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("should not retry a caller cancellation by default", async () => {
    const onRetry = jest.fn();
    const policy = new RetryPolicy({ maxRetries: 3, onRetry }, createTestClock());
    const operation = jest
      .fn()
      .mockRejectedValue(new OperationCancelledError("rate-limit"));

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(
      OperationCancelledError
    );
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it("should report each retry to onRetry", async () => {
    const attempts: RetryAttempt[] = [];
    const failure = new Error("flaky");
    const policy = new RetryPolicy(
      {
        maxRetries: 2,
        baseDelay: 100,
        onRetry: (event) => attempts.push(event),
      },
      createTestClock()
    );

    await expect(
      policy.execute(jest.fn().mockRejectedValue(failure))
    ).rejects.toBe(failure);

    expect(attempts).toEqual([
      { attempt: 0, delay: 100, reason: "error", error: failure },
      { attempt: 1, delay: 200, reason: "error", error: failure },
    ]);
  });

  it("should retry synchronous operations with the same schedule", () => {
    const clock = createTestClock();
    const policy = new RetryPolicy({ maxRetries: 3, baseDelay: 100 }, clock);
    let calls = 0;

    const result = policy.executeSync(() => {
      calls++;
      if (calls < 3) {
        throw new Error("not yet");
      }
      return calls;
    });

    expect(result).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("should stop waiting when the caller cancels", async () => {
    const controller = new AbortController();
    const policy = new RetryPolicy({ maxRetries: 3 }, createTestClock());
    const operation = jest.fn(async () => {
      controller.abort();
      throw new Error("unavailable");
    });

    const error = await policy
      .execute(operation, controller.signal)
      .catch((reason) => reason);

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error.stage).toBe("retry");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should wait out the real backoff between attempts", async () => {
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("ok");

    const started = Date.now();
    await expect(
      withRetry(operation, { maxRetries: 2, baseDelay: 100, backoffFactor: 2 })
    ).resolves.toBe("ok");

    // 100ms + 200ms, allowing for timer granularity
    expect(Date.now() - started).toBeGreaterThanOrEqual(295);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should reject invalid configuration", () => {
    expect(() => new RetryPolicy({ backoffFactor: 0.5 })).toThrow(
      ResilienceConfigError
    );
    expect(() => new RetryPolicy({ baseDelay: 500, maxDelay: 100 })).toThrow(
      "Invalid retry configuration: maxDelay Max delay must not be below base delay"
    );
  });
});
