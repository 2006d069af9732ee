import { Request, Response, NextFunction } from "express";
import { resilienceRegistry } from "@/config/resilience";
import { createContextLogger } from "@/monitoring/logger";
import { ResilienceError } from "@/resilience/errors";
import type { ResilienceRegistry } from "@/resilience/registry";
import type { ResiliencePipeline } from "@/resilience/pipeline";
import { resourceParamsSchema } from "@/api/validation/resilienceValidation";
import "@/types/express";

// Handlers only touch these parts of the Express objects
type AdminRequest = Pick<Request, "params" | "correlationId">;
type AdminResponse = Pick<Response, "json">;

const findPipeline = (
  registry: ResilienceRegistry,
  req: AdminRequest
): ResiliencePipeline => {
  const { name } = resourceParamsSchema.parse(req.params);
  const pipeline = registry.get(name);
  if (!pipeline) {
    throw new ResilienceError(`Resource '${name}' not found`, 404);
  }
  return pipeline;
};

export const createResilienceController = (
  registry: ResilienceRegistry = resilienceRegistry
) => {
  const listResources = (req: AdminRequest, res: AdminResponse) => {
    const resources = registry.getAllStats();

    createContextLogger(req.correlationId).debug("Resilience resources listed", {
      count: resources.length,
    });

    res.json({
      success: true,
      data: resources,
      correlationId: req.correlationId,
    });
  };

  const getResource = (req: AdminRequest, res: AdminResponse, next: NextFunction) => {
    try {
      const pipeline = findPipeline(registry, req);

      res.json({
        success: true,
        data: pipeline.getStats(),
        correlationId: req.correlationId,
      });
    } catch (error) {
      next(error);
    }
  };

  const resetCircuit = (req: AdminRequest, res: AdminResponse, next: NextFunction) => {
    const contextLogger = createContextLogger(req.correlationId);

    try {
      const pipeline = findPipeline(registry, req);
      const breaker = pipeline.circuitBreaker;
      if (!breaker) {
        throw new ResilienceError(
          `Resource '${pipeline.name}' has no circuit breaker`,
          409
        );
      }

      breaker.reset();
      contextLogger.info("Circuit breaker reset via admin API", {
        resource: pipeline.name,
      });

      res.json({
        success: true,
        data: breaker.getStats(),
        correlationId: req.correlationId,
      });
    } catch (error) {
      next(error);
    }
  };

  const forceOpenCircuit = (
    req: AdminRequest,
    res: AdminResponse,
    next: NextFunction
  ) => {
    const contextLogger = createContextLogger(req.correlationId);

    try {
      const pipeline = findPipeline(registry, req);
      const breaker = pipeline.circuitBreaker;
      if (!breaker) {
        throw new ResilienceError(
          `Resource '${pipeline.name}' has no circuit breaker`,
          409
        );
      }

      breaker.forceOpen();
      contextLogger.warn("Circuit breaker forced OPEN via admin API", {
        resource: pipeline.name,
      });

      res.json({
        success: true,
        data: breaker.getStats(),
        correlationId: req.correlationId,
      });
    } catch (error) {
      next(error);
    }
  };

  return { listResources, getResource, resetCircuit, forceOpenCircuit };
};

export type ResilienceController = ReturnType<typeof createResilienceController>;
