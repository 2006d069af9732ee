import express, { Express } from "express";
import type http from "http";
import { correlationIdMiddleware } from "@/api/middleware/correlationId";
import { errorHandler, notFoundHandler } from "@/api/middleware/errorHandler";
import { createApiRoutes } from "@/api/routes";
import { resilienceRegistry } from "@/config/resilience";
import { createHealthCheck } from "@/monitoring/healthCheck";
import { logger } from "@/monitoring/logger";
import type { ResilienceRegistry } from "@/resilience/registry";

export const createApp = (
  registry: ResilienceRegistry = resilienceRegistry
): Express => {
  const app = express();

  // Basic middleware
  app.use(express.json({ limit: "1mb" }));

  // Custom middleware
  app.use(correlationIdMiddleware);

  // Health checks
  app.get("/health", createHealthCheck(registry));

  // API routes
  app.use("/api", createApiRoutes(registry));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export const setupGracefulShutdown = (server: http.Server) => {
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    server.close(() => {
      logger.info("HTTP server closed");
      process.exit(0);
    });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error(
        "Could not close connections in time, forcefully shutting down"
      );
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};
