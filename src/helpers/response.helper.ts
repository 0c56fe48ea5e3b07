import type { Response } from "express";
import type { ErrorResponse, MessageResponse } from "../types/api.types";

export class ResponseHelper {
  static json<T>(res: Response, data: T, statusCode = 200): Response {
    return res.status(statusCode).json(data);
  }

  static message(res: Response, message: string, statusCode = 200): Response {
    const response: MessageResponse = { message };
    return res.status(statusCode).json(response);
  }

  static error(res: Response, detail: string, statusCode = 500): Response {
    const response: ErrorResponse = {
      detail,
      statusCode,
      timestamp: new Date().toISOString(),
    };
    return res.status(statusCode).json(response);
  }

  static redirect(res: Response, url: string, statusCode = 302): void {
    res.redirect(statusCode, url);
  }
}
