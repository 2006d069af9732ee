import { z } from "zod";
import { ResilienceConfigError } from "@/resilience/errors";

const resourceName = z.string().min(1, "Name is required");

export const circuitBreakerConfigSchema = z.object({
  name: resourceName,
  enabled: z.boolean(),
  failureThreshold: z.number().int().min(1, "Failure threshold must be at least 1"),
  recoveryTimeout: z.number().finite().min(0, "Recovery timeout must be non-negative"),
  successThreshold: z.number().int().min(1, "Success threshold must be at least 1"),
});

export const retryConfigSchema = z
  .object({
    name: resourceName,
    maxRetries: z.number().int().min(0, "Max retries must be non-negative"),
    baseDelay: z.number().finite().min(0, "Base delay must be non-negative"),
    backoffFactor: z.number().finite().min(1, "Backoff factor must be at least 1"),
    maxDelay: z.number().finite().min(0, "Max delay must be non-negative"),
    jitter: z.boolean(),
  })
  .refine((value) => value.maxDelay >= value.baseDelay, {
    message: "Max delay must not be below base delay",
    path: ["maxDelay"],
  });

export const rateLimiterConfigSchema = z.object({
  name: resourceName,
  requestsPerSecond: z
    .number()
    .finite()
    .positive("Requests per second must be positive")
    .nullable(),
  burstSize: z.number().int().min(1, "Burst size must be at least 1"),
});

export const bulkheadConfigSchema = z.object({
  name: resourceName,
  enabled: z.boolean(),
  // 0 and negative values are accepted and mean "unbounded"
  maxConcurrent: z.number().int().nullable(),
  acquireTimeout: z.number().finite().min(0, "Acquire timeout must be non-negative"),
});

/**
 * Validates the plain-data part of a component config. Callbacks are not part
 * of the schema and are carried over from the input untouched.
 */
export const parseComponentConfig = <S extends z.ZodTypeAny>(
  component: string,
  schema: S,
  input: unknown
): z.infer<S> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ResilienceConfigError(component, result.error.issues);
  }
  return result.data;
};
