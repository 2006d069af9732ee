import type { ZodIssue } from "zod";
import type { CircuitState } from "@/types";

export class ResilienceError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

// The protection layer declined to run the operation at all
export class ResilienceRejectionError extends ResilienceError {
  constructor(
    message: string,
    public readonly resource: string
  ) {
    super(message, 503);
  }
}

export class CircuitOpenError extends ResilienceRejectionError {
  constructor(
    resource: string,
    public readonly circuitState: CircuitState,
    public readonly retryAfter: number
  ) {
    super(
      `Circuit breaker '${resource}' is OPEN. Retry in ${retryAfter}ms`,
      resource
    );
  }
}

export class BulkheadRejectedError extends ResilienceRejectionError {
  constructor(
    resource: string,
    public readonly maxConcurrent: number,
    public readonly acquireTimeout: number
  ) {
    super(
      acquireTimeout > 0
        ? `Bulkhead '${resource}' capacity reached (${maxConcurrent}), no permit within ${acquireTimeout}ms`
        : `Bulkhead '${resource}' capacity reached (${maxConcurrent})`,
      resource
    );
  }
}

export class OperationCancelledError extends ResilienceError {
  constructor(
    public readonly stage: "retry" | "rate-limit" | "bulkhead",
    public readonly reason?: unknown
  ) {
    super(`Operation cancelled while waiting in ${stage}`, 499);
  }
}

export class ResilienceConfigError extends ResilienceError {
  constructor(
    component: string,
    public readonly issues: ZodIssue[]
  ) {
    super(
      `Invalid ${component} configuration: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`,
      500,
      false
    );
  }
}

export const isRejection = (
  error: unknown
): error is ResilienceRejectionError =>
  error instanceof ResilienceRejectionError;

// Outcomes that say nothing about the protected resource's health
export const isNeutral = (
  error: unknown
): error is ResilienceRejectionError | OperationCancelledError =>
  isRejection(error) || error instanceof OperationCancelledError;
