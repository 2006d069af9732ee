import type { CallOutcome, FailureClassifier } from "@/types";
import { CircuitOpenError, OperationCancelledError } from "./errors";

export const DEFAULT_RETRY_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];
export const DEFAULT_FAILURE_STATUS_CODES: readonly number[] = [500, 502, 503, 504];

type ErrorType = abstract new (...args: never[]) => unknown;

// Reads `status` or `statusCode` off response-like values
export const getStatusCode = (value: unknown): number | undefined => {
  if (typeof value !== "object" || value === null) {
    return undefined;
  }
  if ("status" in value && typeof value.status === "number") {
    return value.status;
  }
  if ("statusCode" in value && typeof value.statusCode === "number") {
    return value.statusCode;
  }
  return undefined;
};

export const hasStatusCode =
  (codes: readonly number[]) =>
  (value: unknown): boolean => {
    const status = getStatusCode(value);
    return status !== undefined && codes.includes(status);
  };

export const retryOnStatusCodes = (
  codes: readonly number[] = DEFAULT_RETRY_STATUS_CODES
): ((result: unknown) => boolean) => hasStatusCode(codes);

export const isErrorType =
  (...types: ErrorType[]) =>
  (error: unknown): boolean =>
    types.some((type) => error instanceof type);

export const not =
  <A>(predicate: (value: A) => boolean) =>
  (value: A): boolean =>
    !predicate(value);

export const anyOf =
  <A>(...predicates: Array<(value: A) => boolean>) =>
  (value: A): boolean =>
    predicates.some((predicate) => predicate(value));

/**
 * Retry every error except a circuit-open rejection or a caller cancellation.
 * Used when a retry policy is given no error classifier.
 */
export const defaultRetryableError = (error: unknown): boolean =>
  !(error instanceof CircuitOpenError) &&
  !(error instanceof OperationCancelledError);

export const defaultFailureClassifier: FailureClassifier = (outcome) =>
  outcome.kind === "error";

// Thrown errors always count; returned values count when their status matches
export const failOnStatusCodes =
  (codes: readonly number[] = DEFAULT_FAILURE_STATUS_CODES): FailureClassifier =>
  (outcome: CallOutcome) =>
    outcome.kind === "error" || hasStatusCode(codes)(outcome.value);

export const failOnErrorTypes =
  (...types: ErrorType[]): FailureClassifier =>
  (outcome: CallOutcome) =>
    outcome.kind === "error" && isErrorType(...types)(outcome.error);
