import { getRequestContext } from "../middleware/requestContext";

type LogLevel = "info" | "warn" | "error";

export type LogFields = {
  requestId?: string;
  route?: string;
  documentId?: string;
  durationMs?: number | null;
  [key: string]: unknown;
};

const SERVICE_NAME = "document-review-server";

function shouldWrite(): boolean {
  return process.env.NODE_ENV !== "test" || process.env.TEST_LOGGING === "true";
}

function buildEntry(level: LogLevel, event: string, fields: LogFields): Record<string, unknown> {
  const context = getRequestContext();
  const { requestId, route, documentId, durationMs, ...rest } = fields;
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    service: SERVICE_NAME,
    event,
    requestId: requestId ?? context?.requestId ?? null,
    route: route ?? context?.route ?? null,
  };
  const boundDocument = documentId ?? context?.documentId;
  if (boundDocument) {
    entry.documentId = boundDocument;
  }
  if (durationMs !== undefined && durationMs !== null) {
    entry.durationMs = durationMs;
  }
  return { ...entry, ...rest };
}

function write(level: LogLevel, event: string, fields: LogFields = {}): void {
  if (!shouldWrite()) {
    return;
  }
  const line = `${JSON.stringify(buildEntry(level, event, fields))}\n`;
  if (level === "error") {
    process.stderr.write(line);
  } else {
    process.stdout.write(line);
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  write("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  write("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  write("error", event, fields);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown_error";
}
