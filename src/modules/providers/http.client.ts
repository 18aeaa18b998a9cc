import type { ZodType, ZodTypeDef } from "zod";
import { RemoteServiceError } from "../pipeline/pipeline.errors";

export type RemoteClientConfig = {
  service: string;
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
};

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * POSTs JSON to a remote capability and validates the reply. Network failures,
 * 429 and 5xx are retryable; other statuses and malformed payloads are not.
 */
export async function postJson<T>(
  config: RemoteClientConfig,
  path: string,
  body: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>,
  signal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs);
  const forwardAbort = (): void => controller.abort();
  signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    let response: Response;
    try {
      response = await fetch(joinUrl(config.baseUrl, path), {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      throw new RemoteServiceError({
        service: config.service,
        message: `${config.service} request failed: ${
          err instanceof Error ? err.message : "network_error"
        }`,
        retryable: !signal?.aborted,
      });
    }

    if (!response.ok) {
      const text = await response.text();
      throw new RemoteServiceError({
        service: config.service,
        message: `${config.service} responded ${response.status}: ${text.slice(0, 200)}`,
        retryable: isRetryableStatus(response.status),
        upstreamStatus: response.status,
      });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new RemoteServiceError({
        service: config.service,
        message: `${config.service} returned malformed JSON`,
        retryable: false,
        upstreamStatus: response.status,
      });
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RemoteServiceError({
        service: config.service,
        message: `${config.service} returned an invalid payload`,
        retryable: false,
        upstreamStatus: response.status,
      });
    }
    return parsed.data;
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", forwardAbort);
  }
}
