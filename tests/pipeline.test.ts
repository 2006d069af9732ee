import { ResiliencePipeline } from "../src/resilience/pipeline";
import {
  BulkheadRejectedError,
  CircuitOpenError,
  OperationCancelledError,
} from "../src/resilience/errors";
import { logger } from "../src/monitoring/logger";
import { createDeferred, createTestClock } from "./helpers/testClock";

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

describe("ResiliencePipeline", () => {
  it("should record one breaker outcome per call after retries", async () => {
    const clock = createTestClock();
    const pipeline = new ResiliencePipeline(
      "payments",
      {
        circuitBreaker: { failureThreshold: 1, recoveryTimeout: 1000 },
        retry: { maxRetries: 2, baseDelay: 10 },
      },
      clock
    );
    const operation = jest.fn().mockRejectedValue(new Error("unavailable"));

    await expect(pipeline.execute(operation)).rejects.toThrow("unavailable");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(pipeline.getStats().circuitBreaker).toMatchObject({
      state: "OPEN",
      totalFailures: 1,
    });

    // Open circuit: rejected before any attempt, and not retried
    await expect(pipeline.execute(operation)).rejects.toBeInstanceOf(
      CircuitOpenError
    );
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("should pass every attempt through the rate limiter", async () => {
    const clock = createTestClock();
    const pipeline = new ResiliencePipeline(
      "search",
      {
        retry: { maxRetries: 2, baseDelay: 100 },
        rateLimiter: { requestsPerSecond: 2, burstSize: 1 },
      },
      clock
    );
    const operation = jest
      .fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue("found");

    await expect(pipeline.execute(operation)).resolves.toBe("found");

    // retry 100, throttle 400, retry 200, throttle 300
    expect(clock.sleeps).toEqual([100, 400, 200, 300]);
    expect(pipeline.getStats().rateLimiter).toMatchObject({
      totalRequests: 3,
      totalThrottled: 2,
      lastRequestTime: 1000,
    });
  });

  it("should not count a bulkhead rejection against the circuit", async () => {
    const pipeline = new ResiliencePipeline(
      "reports",
      {
        circuitBreaker: { failureThreshold: 1 },
        bulkhead: { maxConcurrent: 1 },
      },
      createTestClock()
    );
    const gate = createDeferred();

    const holder = pipeline.execute(() => gate.promise);
    await expect(pipeline.execute(async () => "second")).rejects.toBeInstanceOf(
      BulkheadRejectedError
    );

    expect(pipeline.getStats().circuitBreaker).toMatchObject({
      state: "CLOSED",
      totalFailures: 0,
    });
    expect(pipeline.getStats().bulkhead).toMatchObject({ totalRejected: 1 });

    gate.resolve();
    await holder;
  });

  it("should run synchronous operations through the same layers", () => {
    const clock = createTestClock();
    const pipeline = new ResiliencePipeline(
      "cache",
      {
        circuitBreaker: { failureThreshold: 2 },
        retry: { maxRetries: 1, baseDelay: 50 },
        bulkhead: { maxConcurrent: 1 },
      },
      clock
    );
    let calls = 0;

    const result = pipeline.executeSync(() => {
      calls++;
      if (calls === 1) {
        throw new Error("cold");
      }
      return "warm";
    });

    expect(result).toBe("warm");
    expect(clock.sleeps).toEqual([50]);
    expect(pipeline.getStats().circuitBreaker).toMatchObject({
      totalSuccesses: 1,
      totalFailures: 0,
    });
  });

  it("should call the operation directly when the policy is empty", async () => {
    const pipeline = new ResiliencePipeline("plain");

    await expect(pipeline.execute(async () => 7)).resolves.toBe(7);
    expect(pipeline.getStats()).toEqual({
      name: "plain",
      circuitBreaker: null,
      rateLimiter: null,
      bulkhead: null,
    });
  });

  it("should name every component after the resource", () => {
    const pipeline = new ResiliencePipeline("inventory", {
      circuitBreaker: {},
      retry: {},
      rateLimiter: {},
      bulkhead: {},
    });

    expect(pipeline.circuitBreaker?.config.name).toBe("inventory");
    expect(pipeline.retryPolicy?.config.name).toBe("inventory");
    expect(pipeline.rateLimiter?.config.name).toBe("inventory");
    expect(pipeline.bulkhead?.config.name).toBe("inventory");
  });

  it("should log under the caller's correlation id", async () => {
    const pipeline = new ResiliencePipeline("orders");

    await pipeline.execute(async () => "ok", { correlationId: "req-test" });

    expect(logger.child).toHaveBeenCalledWith({
      correlationId: "req-test",
      resource: "orders",
    });
  });

  it("should keep arguments through wrap", async () => {
    const pipeline = new ResiliencePipeline("math", {
      retry: { maxRetries: 0 },
    });
    const multiply = pipeline.wrap(async (a: number, b: number) => a * b);

    await expect(multiply(6, 7)).resolves.toBe(42);
  });
});

describe("ResiliencePipeline cancellation", () => {
  it("should leave the circuit untouched when cancelled during retry backoff", async () => {
    const controller = new AbortController();
    const pipeline = new ResiliencePipeline(
      "payments",
      {
        circuitBreaker: { failureThreshold: 1 },
        retry: { maxRetries: 3, baseDelay: 100 },
      },
      createTestClock()
    );
    const operation = jest.fn(async () => {
      controller.abort();
      throw new Error("unavailable");
    });

    const error = await pipeline
      .execute(operation, { signal: controller.signal })
      .catch((reason) => reason);

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error.stage).toBe("retry");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(pipeline.getStats().circuitBreaker).toMatchObject({
      state: "CLOSED",
      failureCount: 0,
      totalFailures: 0,
      lastFailureTime: null,
    });
  });

  it("should neither retry nor count a cancelled rate-limit wait", async () => {
    const clock = createTestClock();
    const controller = new AbortController();
    clock.sleep = async (_ms, signal) => {
      controller.abort();
      throw signal?.reason;
    };
    const onRetry = jest.fn();
    const pipeline = new ResiliencePipeline(
      "search",
      {
        circuitBreaker: { failureThreshold: 1 },
        retry: { maxRetries: 3, onRetry },
        rateLimiter: { requestsPerSecond: 1, burstSize: 1 },
      },
      clock
    );
    const operation = jest.fn<Promise<string>, []>().mockResolvedValue("found");

    await pipeline.execute(operation);
    const error = await pipeline
      .execute(operation, { signal: controller.signal })
      .catch((reason) => reason);

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error.stage).toBe("rate-limit");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
    expect(pipeline.getStats().circuitBreaker).toMatchObject({
      state: "CLOSED",
      failureCount: 0,
      totalFailures: 0,
      totalSuccesses: 1,
    });
    expect(pipeline.getStats().rateLimiter).toMatchObject({ totalRequests: 1 });
  });

  it("should hold no permit and count nothing for a caller cancelled in the bulkhead queue", async () => {
    const controller = new AbortController();
    const pipeline = new ResiliencePipeline(
      "reports",
      {
        circuitBreaker: { failureThreshold: 1 },
        bulkhead: { maxConcurrent: 1, acquireTimeout: 5000 },
      },
      createTestClock()
    );
    const gate = createDeferred();
    const holder = pipeline.execute(() => gate.promise);
    const queued = jest.fn<Promise<string>, []>().mockResolvedValue("never");

    const waiter = pipeline.execute(queued, { signal: controller.signal });
    expect(pipeline.getStats().bulkhead).toMatchObject({ waiting: 1 });
    controller.abort();

    const error = await waiter.catch((reason) => reason);
    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error.stage).toBe("bulkhead");
    expect(queued).not.toHaveBeenCalled();
    expect(pipeline.circuitBreaker?.isClosed()).toBe(true);
    expect(pipeline.getStats().circuitBreaker).toMatchObject({
      failureCount: 0,
      totalFailures: 0,
    });

    gate.resolve();
    await holder;
    expect(pipeline.getStats().bulkhead).toMatchObject({
      active: 0,
      waiting: 0,
      available: 1,
      totalExecuted: 1,
    });
  });
});
