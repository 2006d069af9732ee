export const CIRCUIT_STATE = {
  CLOSED: "CLOSED",
  OPEN: "OPEN",
  HALF_OPEN: "HALF_OPEN",
} as const;

export type CircuitState = (typeof CIRCUIT_STATE)[keyof typeof CIRCUIT_STATE];

// What a protected call produced: a value or a thrown error
export type CallOutcome<T = unknown> =
  | { kind: "result"; value: T }
  | { kind: "error"; error: unknown };

export type FailureClassifier = (outcome: CallOutcome) => boolean;

export interface CircuitBreakerConfig {
  name: string;
  enabled: boolean;
  failureThreshold: number;
  /** Milliseconds the circuit stays OPEN before the next call may probe */
  recoveryTimeout: number;
  successThreshold: number;
  failureClassifier?: FailureClassifier;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  totalCalls: number;
  totalFailures: number;
  totalSuccesses: number;
  totalRejected: number;
  failureRate: number;
  successRate: number;
}
