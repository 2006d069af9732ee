import { config, type AppConfig } from "@/config/env";
import {
  failOnStatusCodes,
  retryOnStatusCodes,
} from "@/resilience/classifiers";
import { ResilienceRegistry } from "@/resilience/registry";
import type { ResiliencePolicy } from "@/types";

export const buildDefaultPolicy = (
  settings: AppConfig = config
): ResiliencePolicy => {
  const { circuitBreaker, retry, rateLimit, bulkhead } = settings;

  return {
    circuitBreaker: {
      enabled: circuitBreaker.enabled,
      failureThreshold: circuitBreaker.failureThreshold,
      recoveryTimeout: circuitBreaker.recoveryTimeout,
      successThreshold: circuitBreaker.successThreshold,
      failureClassifier: failOnStatusCodes(circuitBreaker.failureStatusCodes),
    },
    retry: {
      maxRetries: retry.maxRetries,
      baseDelay: retry.baseDelay,
      backoffFactor: retry.backoffFactor,
      maxDelay: retry.maxDelay,
      jitter: retry.jitter,
      retryableResult: retryOnStatusCodes(retry.retryStatusCodes),
    },
    rateLimiter: {
      requestsPerSecond: rateLimit.requestsPerSecond,
      burstSize: rateLimit.burstSize,
    },
    bulkhead: {
      enabled: bulkhead.enabled,
      maxConcurrent: bulkhead.maxConcurrent,
      acquireTimeout: bulkhead.acquireTimeout,
    },
  };
};

// Process-wide registry used by the admin API
export const resilienceRegistry = new ResilienceRegistry(buildDefaultPolicy());
