import { Request, Response } from "express";
import { resilienceRegistry } from "@/config/resilience";
import type { ResilienceRegistry } from "@/resilience/registry";
import { CIRCUIT_STATE } from "@/types";
import { logger } from "./logger";
import "@/types/express";

interface HealthStatus {
  status: "healthy" | "degraded";
  timestamp: string;
  services: {
    api: "up" | "down";
    circuits: "closed" | "open";
  };
  openCircuits: string[];
  uptime: number;
}

// An open circuit degrades the service but the admin API itself stays up
export const createHealthCheck =
  (registry: ResilienceRegistry = resilienceRegistry) =>
  (req: Pick<Request, "correlationId">, res: Pick<Response, "status">) => {
    const startTime = Date.now();

    const openCircuits = registry
      .getAllStats()
      .filter((stats) => stats.circuitBreaker?.state === CIRCUIT_STATE.OPEN)
      .map((stats) => stats.name);

    const healthStatus: HealthStatus = {
      status: openCircuits.length === 0 ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      services: {
        api: "up",
        circuits: openCircuits.length === 0 ? "closed" : "open",
      },
      openCircuits,
      uptime: process.uptime(),
    };

    const responseTime = Date.now() - startTime;
    if (openCircuits.length > 0) {
      logger.warn("Health check degraded", {
        correlationId: req.correlationId,
        responseTime,
        openCircuits,
      });
    } else {
      logger.info("Health check completed", {
        correlationId: req.correlationId,
        responseTime,
      });
    }

    res.status(200).json(healthStatus);
  };
