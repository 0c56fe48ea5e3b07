import { Router } from "express";
import { createActivityRoutes } from "./activity.routes";
import { healthCheck } from "../controllers/health";
import type { ActivityRegistry } from "../services/activity.service";

export function createRoutes(registry: ActivityRegistry): Router {
  const router = Router();

  router.use("/activities", createActivityRoutes(registry));

  router.get("/health", healthCheck);

  return router;
}
