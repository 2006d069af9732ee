export interface RateLimiterConfig {
  name: string;
  /** null disables the limiter */
  requestsPerSecond: number | null;
  burstSize: number;
}

export interface RateLimiterStats {
  name: string;
  enabled: boolean;
  requestsPerSecond: number | null;
  burstSize: number;
  burstCount: number;
  lastRequestTime: number | null;
  totalRequests: number;
  totalThrottled: number;
  totalWaitTime: number;
}
