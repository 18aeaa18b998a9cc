import { type NextFunction, type Request, type Response } from "express";
import { logInfo, logWarn } from "../observability/logger";
import { getRequestContext } from "./requestContext";

const QUIET_ROUTES = new Set(["/health"]);

/** One line per finished request; health checks are not logged. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (QUIET_ROUTES.has(req.path)) {
    next();
    return;
  }
  const context = getRequestContext();

  res.on("finish", () => {
    const log = res.statusCode >= 500 ? logWarn : logInfo;
    log("request_completed", {
      method: req.method,
      route: req.originalUrl,
      status: res.statusCode,
      bodyBytes: Number(req.get("content-length") ?? 0),
      documentId: context?.documentId,
      durationMs: context ? Date.now() - context.startedAt : null,
    });
  });

  next();
}
