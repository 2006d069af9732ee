export interface BulkheadConfig {
  name: string;
  enabled: boolean;
  /** null or anything below 1 means unbounded */
  maxConcurrent: number | null;
  /** Milliseconds to wait for a permit; 0 never waits */
  acquireTimeout: number;
}

export interface BulkheadStats {
  name: string;
  bounded: boolean;
  maxConcurrent: number | null;
  active: number;
  waiting: number;
  /** null when unbounded */
  available: number | null;
  totalExecuted: number;
  totalRejected: number;
}
