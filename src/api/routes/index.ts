import { Router } from "express";
import { createResilienceRoutes } from "./resilienceRoutes";
import { createResilienceController } from "@/api/controllers/resilienceController";
import { createMetricsHandler } from "@/api/controllers/metricsController";
import type { ResilienceRegistry } from "@/resilience/registry";

export const createApiRoutes = (registry: ResilienceRegistry): Router => {
  const router: Router = Router();

  // Mount route modules
  router.use(
    "/resilience",
    createResilienceRoutes(createResilienceController(registry))
  );

  // System metrics endpoint
  router.get("/metrics", createMetricsHandler(registry));

  return router;
};
