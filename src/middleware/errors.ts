import { type NextFunction, type Request, type Response } from "express";
import { logError, logWarn } from "../observability/logger";

export type ErrorCode =
  | "INVALID_REQUEST"
  | "INVALID_SOURCE"
  | "FORMAT_NOT_SUPPORTED"
  | "REMOTE_SERVICE_ERROR"
  | "TIMEOUT"
  | "NOT_FOUND"
  | "CONFLICT"
  | "OVERLOADED"
  | "INTERNAL";

export type ErrorEnvelope = {
  error_code: ErrorCode;
  message: string;
  [key: string]: unknown;
};

export class AppError extends Error {
  status: number;
  code: ErrorCode;
  details: Record<string, unknown> | undefined;

  constructor(
    code: ErrorCode,
    message: string,
    status = 400,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
  }

  toEnvelope(): ErrorEnvelope {
    return {
      ...(this.details ?? {}),
      error_code: this.code,
      message: this.message,
    };
  }
}

export function notFoundError(message: string): AppError {
  return new AppError("NOT_FOUND", message, 404);
}

/**
 * Converts anything thrown across the pipeline boundary into an envelope.
 * Unexpected errors never leak their message.
 */
export function toErrorEnvelope(error: unknown): ErrorEnvelope {
  if (error instanceof AppError) {
    return error.toEnvelope();
  }
  return { error_code: "INTERNAL", message: "Unexpected error" };
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error_code: "NOT_FOUND",
    message: `Route ${req.method} ${req.path} not found`,
    request_id: res.locals.requestId ?? "unknown",
  });
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = res.locals.requestId ?? "unknown";
  const durationMs = res.locals.requestStart
    ? Date.now() - Number(res.locals.requestStart)
    : 0;
  const logBase = {
    requestId,
    method: req.method,
    route: req.originalUrl,
    durationMs,
  };

  if (err instanceof AppError) {
    const log = err.status >= 500 ? logError : logWarn;
    log("request_error", {
      ...logBase,
      status: err.status,
      code: err.code,
      message: err.message,
    });
    res.status(err.status).json({ ...err.toEnvelope(), request_id: requestId });
    return;
  }

  // express.json() rejects malformed bodies with a 400 SyntaxError
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    logWarn("request_error", { ...logBase, status: 400, code: "INVALID_REQUEST" });
    res.status(400).json({
      error_code: "INVALID_REQUEST",
      message: "Request body is not valid JSON.",
      request_id: requestId,
    });
    return;
  }

  if ("type" in err && err.type === "entity.too.large") {
    logWarn("request_error", { ...logBase, status: 413, code: "INVALID_SOURCE" });
    res.status(413).json({
      error_code: "INVALID_SOURCE",
      message: "Request body exceeds the document size limit.",
      request_id: requestId,
    });
    return;
  }

  logError("request_error", {
    ...logBase,
    status: 500,
    code: "INTERNAL",
    message: err.message,
    stack: err.stack,
  });
  res.status(500).json({
    error_code: "INTERNAL",
    message: "Unexpected error",
    request_id: requestId,
  });
}
