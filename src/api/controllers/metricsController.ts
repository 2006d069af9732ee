import { Request, Response } from "express";
import { resilienceRegistry } from "@/config/resilience";
import { createContextLogger } from "@/monitoring/logger";
import type { ResilienceRegistry } from "@/resilience/registry";
import { CIRCUIT_STATE } from "@/types";
import "@/types/express";

interface SystemMetrics {
  timestamp: string;
  resilience: {
    resources: number;
    openCircuits: number;
    rejectedCalls: number;
    throttledCalls: number;
    activeCalls: number;
  };
  memory: {
    used: number;
    total: number;
    usage: string;
  };
  uptime: number;
  process: {
    pid: number;
    version: string;
  };
}

export const createMetricsHandler =
  (registry: ResilienceRegistry = resilienceRegistry) =>
  (req: Request, res: Response) => {
    const contextLogger = createContextLogger(req.correlationId);

    try {
      const memUsage = process.memoryUsage();
      const stats = registry.getAllStats();

      const metrics: SystemMetrics = {
        timestamp: new Date().toISOString(),
        resilience: {
          resources: stats.length,
          openCircuits: stats.filter(
            (s) => s.circuitBreaker?.state === CIRCUIT_STATE.OPEN
          ).length,
          rejectedCalls: stats.reduce(
            (sum, s) =>
              sum +
              (s.circuitBreaker?.totalRejected ?? 0) +
              (s.bulkhead?.totalRejected ?? 0),
            0
          ),
          throttledCalls: stats.reduce(
            (sum, s) => sum + (s.rateLimiter?.totalThrottled ?? 0),
            0
          ),
          activeCalls: stats.reduce((sum, s) => sum + (s.bulkhead?.active ?? 0), 0),
        },
        memory: {
          used: Math.round(memUsage.heapUsed / 1024 / 1024), // MB
          total: Math.round(memUsage.heapTotal / 1024 / 1024), // MB
          usage: `${Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100)}%`,
        },
        uptime: Math.round(process.uptime()),
        process: {
          pid: process.pid,
          version: process.version,
        },
      };

      contextLogger.info("Metrics requested", {
        openCircuits: metrics.resilience.openCircuits,
        memoryUsage: metrics.memory.usage,
      });

      res.json(metrics);
    } catch (error) {
      contextLogger.error("Failed to get metrics", {
        error: error instanceof Error ? error.message : error,
      });

      res.status(500).json({
        error: "Internal Server Error",
        message: "Failed to retrieve system metrics",
        correlationId: req.correlationId,
      });
    }
  };
