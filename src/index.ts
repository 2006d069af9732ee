export { CircuitBreaker } from "@/resilience/circuitBreaker";
export { RetryPolicy, withRetry, JITTER_RATIO } from "@/resilience/retryPolicy";
export { RateLimiter } from "@/resilience/rateLimiter";
export { Bulkhead } from "@/resilience/bulkhead";
export { ResiliencePipeline, type ExecuteOptions } from "@/resilience/pipeline";
export { ResilienceRegistry, mergePolicies } from "@/resilience/registry";
export {
  ResilienceError,
  ResilienceRejectionError,
  CircuitOpenError,
  BulkheadRejectedError,
  OperationCancelledError,
  ResilienceConfigError,
  isRejection,
  isNeutral,
} from "@/resilience/errors";
export {
  DEFAULT_FAILURE_STATUS_CODES,
  DEFAULT_RETRY_STATUS_CODES,
  anyOf,
  defaultFailureClassifier,
  defaultRetryableError,
  failOnErrorTypes,
  failOnStatusCodes,
  getStatusCode,
  hasStatusCode,
  isErrorType,
  not,
  retryOnStatusCodes,
} from "@/resilience/classifiers";
export { Semaphore } from "@/utils/semaphore";
export { systemClock, type Clock } from "@/utils/clock";
export { buildDefaultPolicy } from "@/config/resilience";
export * from "@/types";
