import { Router } from "express";
import { ActivityController } from "../controllers/activity.controller";
import type { ActivityRegistry } from "../services/activity.service";

export function createActivityRoutes(registry: ActivityRegistry): Router {
  const router = Router();
  const controller = new ActivityController(registry);

  // GET /activities - All activities with their rosters
  router.get("/", controller.getActivities);

  // GET /activities/:activityName - One activity
  router.get("/:activityName", controller.getActivity);

  // POST /activities/:activityName/signup?email=
  router.post("/:activityName/signup", controller.signup);

  // DELETE /activities/:activityName/unregister?email=
  router.delete("/:activityName/unregister", controller.unregister);

  return router;
}
