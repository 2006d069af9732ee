import dotenv from "dotenv";

dotenv.config();

const optionalNumber = (value: string | undefined): number | null =>
  value === undefined || value.trim() === "" ? null : Number(value);

const statusCodes = (value: string): number[] =>
  value
    .split(",")
    .map((code) => code.trim())
    .filter((code) => code.length > 0)
    .map((code) => parseInt(code));

export const config = {
  port: parseInt(process.env.PORT || "3000"),
  serviceName: process.env.SERVICE_NAME || "resilient-calls",
  circuitBreaker: {
    enabled: process.env.RESILIENCE_CIRCUIT_BREAKER_ENABLED === "true",
    failureThreshold: parseInt(
      process.env.RESILIENCE_CIRCUIT_BREAKER_FAILURE_THRESHOLD || "5"
    ),
    recoveryTimeout: parseInt(
      process.env.RESILIENCE_CIRCUIT_BREAKER_RECOVERY_TIMEOUT || "60000" // 60 seconds
    ),
    successThreshold: parseInt(
      process.env.RESILIENCE_CIRCUIT_BREAKER_SUCCESS_THRESHOLD || "2"
    ),
    failureStatusCodes: statusCodes(
      process.env.RESILIENCE_CIRCUIT_BREAKER_FAILURE_STATUS_CODES ||
        "500,502,503,504"
    ),
  },
  retry: {
    maxRetries: parseInt(process.env.RESILIENCE_RETRY_MAX_RETRIES || "3"),
    baseDelay: parseInt(process.env.RESILIENCE_RETRY_BASE_DELAY || "1000"),
    backoffFactor: parseFloat(
      process.env.RESILIENCE_RETRY_BACKOFF_FACTOR || "2"
    ),
    maxDelay: parseInt(process.env.RESILIENCE_RETRY_MAX_DELAY || "30000"),
    jitter: process.env.RESILIENCE_RETRY_JITTER === "true",
    retryStatusCodes: statusCodes(
      process.env.RESILIENCE_RETRY_STATUS_CODES || "429,500,502,503,504"
    ),
  },
  rateLimit: {
    requestsPerSecond: optionalNumber(process.env.RESILIENCE_RATE_LIMIT_RPS),
    burstSize: parseInt(process.env.RESILIENCE_RATE_LIMIT_BURST_SIZE || "1"),
  },
  bulkhead: {
    enabled: process.env.RESILIENCE_BULKHEAD_ENABLED === "true",
    maxConcurrent: optionalNumber(
      process.env.RESILIENCE_BULKHEAD_MAX_CONCURRENT
    ),
    acquireTimeout: parseInt(
      process.env.RESILIENCE_BULKHEAD_ACQUIRE_TIMEOUT || "0"
    ),
  },
  logging: {
    level: process.env.LOG_LEVEL || "info",
  },
};

export type AppConfig = typeof config;
