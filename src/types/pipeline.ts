import type { BulkheadConfig, BulkheadStats } from "./bulkhead";
import type { CircuitBreakerConfig, CircuitBreakerStats } from "./circuitBreaker";
import type { RateLimiterConfig, RateLimiterStats } from "./rateLimiter";
import type { RetryConfig } from "./retry";

// Configs handed to the pipeline; the resource name is filled in per resource
export interface ResiliencePolicy {
  circuitBreaker?: Partial<Omit<CircuitBreakerConfig, "name">>;
  retry?: Partial<Omit<RetryConfig, "name">>;
  rateLimiter?: Partial<Omit<RateLimiterConfig, "name">>;
  bulkhead?: Partial<Omit<BulkheadConfig, "name">>;
}

export interface ResilienceStats {
  name: string;
  circuitBreaker: CircuitBreakerStats | null;
  rateLimiter: RateLimiterStats | null;
  bulkhead: BulkheadStats | null;
}
