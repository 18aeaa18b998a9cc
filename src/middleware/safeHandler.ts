import { type NextFunction, type Request, type Response } from "express";
import { ZodError } from "zod";
import { invalidRequest } from "../modules/pipeline/pipeline.schema";
import { describeError, logError } from "../observability/logger";
import { AppError } from "./errors";

export type AsyncRouteHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forwards rejections to the error handler. Schema failures become
 * `INVALID_REQUEST`; anything that is not an `AppError` becomes `INTERNAL`.
 */
export function safeHandler(handler: AsyncRouteHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch((err: unknown) => {
      if (res.headersSent || err instanceof AppError) {
        next(err);
        return;
      }
      if (err instanceof ZodError) {
        next(invalidRequest(err));
        return;
      }
      logError("route_handler_failed", {
        error: describeError(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      next(new AppError("INTERNAL", "Unexpected error", 500));
    });
  };
}
