import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { RemoteServiceError } from "../../pipeline/pipeline.errors";
import { postJson } from "../http.client";
import { createHttpOcrEngine } from "../ocr.provider";
import { createHttpTextEnhancer } from "../enhancement.provider";

const config = {
  service: "ocr",
  baseUrl: "http://ocr.test/",
  apiKey: "test-secret",
  timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

async function captureRemoteError(promise: Promise<unknown>): Promise<RemoteServiceError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RemoteServiceError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a RemoteServiceError");
}

describe("postJson", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts JSON with a bearer token and validates the reply", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ ok: true }));
    vi.stubGlobal("fetch", fetchMock);

    const payload = await postJson(config, "/v1/ping", { hello: "world" }, z.object({ ok: z.boolean() }));

    expect(payload).toEqual({ ok: true });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://ocr.test/v1/ping");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe('{"hello":"world"}');
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
  });

  it("marks 5xx and 429 as retryable and other statuses as final", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("unavailable", { status: 503 })));
    const unavailable = await captureRemoteError(postJson(config, "/v1/x", {}, z.unknown()));
    expect(unavailable.retryable).toBe(true);
    expect(unavailable.upstreamStatus).toBe(503);
    expect(unavailable.message).toBe("ocr responded 503: unavailable");

    vi.stubGlobal("fetch", vi.fn(async () => new Response("slow down", { status: 429 })));
    expect((await captureRemoteError(postJson(config, "/v1/x", {}, z.unknown()))).retryable).toBe(true);

    vi.stubGlobal("fetch", vi.fn(async () => new Response("bad", { status: 422 })));
    expect((await captureRemoteError(postJson(config, "/v1/x", {}, z.unknown()))).retryable).toBe(false);
  });

  it("treats network failures as retryable", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );
    const error = await captureRemoteError(postJson(config, "/v1/x", {}, z.unknown()));
    expect(error.retryable).toBe(true);
    expect(error.message).toBe("ocr request failed: fetch failed");
  });

  it("rejects payloads that do not match the schema", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ ok: "yes" })));
    const error = await captureRemoteError(
      postJson(config, "/v1/x", {}, z.object({ ok: z.boolean() }))
    );
    expect(error.retryable).toBe(false);
    expect(error.message).toBe("ocr returned an invalid payload");
  });

  it("rejects malformed JSON", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>", { status: 200 })));
    const error = await captureRemoteError(postJson(config, "/v1/x", {}, z.unknown()));
    expect(error.message).toBe("ocr returned malformed JSON");
  });
});

describe("remote adapters", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("derives OCR confidence from word blocks", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          text: "Net 30",
          words: [
            { text: "Net", confidence: 0.9 },
            { text: "30", confidence: 0.7 },
          ],
        })
      )
    );
    const engine = createHttpOcrEngine(config);
    const result = await engine.extractText({ bytes: Buffer.from("img"), format: "png" });
    expect(result.wordCount).toBe(2);
    expect(result.confidenceScore).toBeCloseTo(80, 10);
    expect(result.confidenceDistribution).toEqual({ high: 0, medium: 1, low: 1, veryLow: 0 });
  });

  it("maps enhancement replies", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          enhanced_text: "Net 30 days",
          corrections: [{ original: "dys", corrected: "days", confidence: 0.8, type: "spelling" }],
          tokens_used: 21,
        })
      )
    );
    const enhancer = createHttpTextEnhancer({ ...config, service: "enhancement" });
    expect(await enhancer.enhance("Net 30 dys")).toEqual({
      enhancedText: "Net 30 days",
      corrections: [{ original: "dys", corrected: "days", confidence: 0.8, type: "spelling" }],
      tokensUsed: 21,
    });
  });
});
