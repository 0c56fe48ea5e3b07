import type { Request, Response, NextFunction } from "express";
import type { ActivityRegistry } from "../services/activity.service";
import { ResponseHelper } from "../helpers/response.helper";
import { ValidationError } from "../helpers/error.helper";

type ActivityParams = { activityName: string };

/** Reads the required `email` query parameter, kept exactly as sent. */
function requireEmail(req: Request): string {
  const { email } = req.query;
  if (typeof email !== "string") {
    throw new ValidationError("Query parameter 'email' is required");
  }
  return email;
}

export class ActivityController {
  constructor(private readonly registry: ActivityRegistry) {}

  getActivities = (req: Request, res: Response, next: NextFunction): void => {
    try {
      ResponseHelper.json(res, this.registry.list());
    } catch (error) {
      next(error);
    }
  };

  getActivity = (
    req: Request<ActivityParams>,
    res: Response,
    next: NextFunction
  ): void => {
    try {
      ResponseHelper.json(res, this.registry.get(req.params.activityName));
    } catch (error) {
      next(error);
    }
  };

  signup = async (
    req: Request<ActivityParams>,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const email = requireEmail(req);
      const message = await this.registry.enroll(
        req.params.activityName,
        email
      );
      ResponseHelper.message(res, message);
    } catch (error) {
      next(error);
    }
  };

  unregister = async (
    req: Request<ActivityParams>,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    try {
      const email = requireEmail(req);
      const message = await this.registry.withdraw(
        req.params.activityName,
        email
      );
      ResponseHelper.message(res, message);
    } catch (error) {
      next(error);
    }
  };
}
