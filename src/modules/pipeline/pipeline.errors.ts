import { AppError } from "../../middleware/errors";

export class InvalidSourceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_SOURCE", message, 400, details);
    this.name = "InvalidSourceError";
  }
}

export class FormatNotSupportedError extends AppError {
  constructor(format: string | null, supported: readonly string[]) {
    super(
      "FORMAT_NOT_SUPPORTED",
      format
        ? `Format '${format}' is not supported.`
        : "Unable to detect a supported document format.",
      415,
      { detected_format: format, supported_formats: [...supported] }
    );
    this.name = "FormatNotSupportedError";
  }
}

export class RemoteServiceError extends AppError {
  readonly service: string;
  readonly retryable: boolean;
  readonly upstreamStatus: number | null;

  constructor(params: {
    service: string;
    message: string;
    retryable: boolean;
    upstreamStatus?: number | null;
  }) {
    super("REMOTE_SERVICE_ERROR", params.message, 502, { service: params.service });
    this.name = "RemoteServiceError";
    this.service = params.service;
    this.retryable = params.retryable;
    this.upstreamStatus = params.upstreamStatus ?? null;
  }
}

export class PipelineTimeoutError extends AppError {
  constructor(timeoutMs: number) {
    super("TIMEOUT", `Processing exceeded ${timeoutMs}ms.`, 504, { timeout_ms: timeoutMs });
    this.name = "PipelineTimeoutError";
  }
}

export function isRetryableRemoteError(error: unknown): boolean {
  return error instanceof RemoteServiceError && error.retryable;
}
