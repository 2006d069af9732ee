import { logger } from "@/monitoring/logger";
import { systemClock, type Clock } from "@/utils/clock";
import type { ResiliencePolicy, ResilienceStats } from "@/types";
import { ResiliencePipeline } from "./pipeline";

const mergeSection = <C extends object>(base?: C, override?: C): C | undefined => {
  if (!base) return override;
  if (!override) return base;
  return { ...base, ...override };
};

// Per-component shallow merge; an override replaces individual settings only
export const mergePolicies = (
  base: ResiliencePolicy,
  override: ResiliencePolicy = {}
): ResiliencePolicy => ({
  circuitBreaker: mergeSection(base.circuitBreaker, override.circuitBreaker),
  retry: mergeSection(base.retry, override.retry),
  rateLimiter: mergeSection(base.rateLimiter, override.rateLimiter),
  bulkhead: mergeSection(base.bulkhead, override.bulkhead),
});

/**
 * One pipeline per named resource, so that every caller of a resource shares
 * the same breaker state, pacing and permits.
 */
export class ResilienceRegistry {
  private readonly pipelines = new Map<string, ResiliencePipeline>();

  constructor(
    private readonly defaults: ResiliencePolicy = {},
    private readonly clock: Clock = systemClock
  ) {}

  // The policy only applies on first creation; later calls get the existing pipeline
  getOrCreate(name: string, policy?: ResiliencePolicy): ResiliencePipeline {
    let pipeline = this.pipelines.get(name);
    if (!pipeline) {
      pipeline = new ResiliencePipeline(
        name,
        mergePolicies(this.defaults, policy),
        this.clock
      );
      this.pipelines.set(name, pipeline);
      logger.info("Resilience pipeline registered", { resource: name });
    }
    return pipeline;
  }

  get(name: string): ResiliencePipeline | undefined {
    return this.pipelines.get(name);
  }

  list(): string[] {
    return Array.from(this.pipelines.keys());
  }

  getAllStats(): ResilienceStats[] {
    return Array.from(this.pipelines.values()).map((pipeline) =>
      pipeline.getStats()
    );
  }

  resetAll(): void {
    this.pipelines.forEach((pipeline) => pipeline.circuitBreaker?.reset());
  }
}
