import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import { type NextFunction, type Request, type Response } from "express";

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

export type RequestContext = {
  requestId: string;
  route: string;
  startedAt: number;
  /** Set once a submission has been assigned a document id. */
  documentId?: string;
};

const storage = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

/** Tags the current request's log lines with the document being processed. */
export function bindDocumentId(documentId: string): void {
  const context = storage.getStore();
  if (context) {
    context.documentId = documentId;
  }
}

function acceptedRequestId(header: string | undefined): string | null {
  const value = header?.trim() ?? "";
  if (value.length === 0 || value.length > MAX_REQUEST_ID_LENGTH) {
    return null;
  }
  return REQUEST_ID_PATTERN.test(value) ? value : null;
}

/** Echoes a well-formed `x-request-id` or generates one, and opens the request context. */
export function requestContext(req: Request, res: Response, next: NextFunction): void {
  const context: RequestContext = {
    requestId: acceptedRequestId(req.get("x-request-id")) ?? randomUUID(),
    route: req.originalUrl,
    startedAt: Date.now(),
  };
  res.locals.requestId = context.requestId;
  res.locals.requestStart = context.startedAt;
  res.setHeader("x-request-id", context.requestId);
  runWithRequestContext(context, () => next());
}
