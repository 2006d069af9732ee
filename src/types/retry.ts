export type RetryableResult = (result: unknown) => boolean;
export type RetryableError = (error: unknown) => boolean;

export interface RetryAttempt {
  /** Zero-based index of the attempt that just failed */
  attempt: number;
  delay: number;
  reason: "result" | "error";
  error?: unknown;
  result?: unknown;
}

export interface RetryConfig {
  name: string;
  /** Extra attempts after the first one */
  maxRetries: number;
  baseDelay: number;
  backoffFactor: number;
  maxDelay: number;
  jitter: boolean;
  retryableResult?: RetryableResult;
  retryableError?: RetryableError;
  onRetry?: (attempt: RetryAttempt) => void;
}
