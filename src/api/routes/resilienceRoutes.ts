import { Router } from "express";
import type { ResilienceController } from "@/api/controllers/resilienceController";

export const createResilienceRoutes = (
  controller: ResilienceController
): Router => {
  const router: Router = Router();

  router.get("/", controller.listResources);
  router.get("/:name", controller.getResource);

  // Manual circuit control
  router.post("/:name/reset", controller.resetCircuit);
  router.post("/:name/open", controller.forceOpenCircuit);

  return router;
};
