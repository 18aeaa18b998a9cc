import { describe, expect, it, vi } from "vitest";
import { RemoteServiceError } from "../../pipeline/pipeline.errors";
import type { StorageReference } from "../providers.types";
import { createObjectStorage, parseStorageReference } from "../storage.provider";

describe("parseStorageReference", () => {
  it("parses obs and s3 references", () => {
    expect(parseStorageReference("obs://scans/2024/invoice%201.png")).toEqual({
      bucket: "scans",
      key: "2024/invoice 1.png",
    });
    expect(parseStorageReference("s3://archive/a.pdf")).toEqual({ bucket: "archive", key: "a.pdf" });
  });

  it("rejects other schemes and incomplete references", () => {
    expect(parseStorageReference("https://scans/a.png")).toBeNull();
    expect(parseStorageReference("obs://scans/")).toBeNull();
    expect(parseStorageReference("not a url")).toBeNull();
  });
});

describe("createObjectStorage", () => {
  it("returns the object body as a buffer", async () => {
    const readBody = vi.fn(async (_ref: StorageReference, _signal?: AbortSignal) => new Uint8Array([1, 2, 3]));
    const storage = createObjectStorage(readBody);

    const bytes = await storage.getObject({ bucket: "scans", key: "a.png" });

    expect([...bytes]).toEqual([1, 2, 3]);
    expect(readBody).toHaveBeenCalledWith({ bucket: "scans", key: "a.png" }, undefined);
  });

  it("maps missing objects to a non-retryable remote error", async () => {
    const readBody = vi.fn(async (_ref: StorageReference, _signal?: AbortSignal): Promise<Uint8Array> => {
      throw Object.assign(new Error("NoSuchKey"), { $metadata: { httpStatusCode: 404 } });
    });
    const storage = createObjectStorage(readBody);

    const error = await storage.getObject({ bucket: "scans", key: "gone.png" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteServiceError);
    if (error instanceof RemoteServiceError) {
      expect(error.retryable).toBe(false);
      expect(error.upstreamStatus).toBe(404);
      expect(error.message).toBe("storage fetch failed for scans/gone.png: NoSuchKey");
    }
  });

  it("falls back to the error name when the response carries no status", async () => {
    const storage = createObjectStorage(async () => {
      throw Object.assign(new Error("The specified key does not exist."), { name: "NoSuchKey" });
    });
    const error = await storage.getObject({ bucket: "scans", key: "gone.png" }).catch((err: unknown) => err);
    expect(error).toMatchObject({ retryable: false, upstreamStatus: 404 });
  });

  it("retries throttling and server errors", async () => {
    const storage = createObjectStorage(async () => {
      throw Object.assign(new Error("SlowDown"), { $metadata: { httpStatusCode: 503 } });
    });
    const error = await storage.getObject({ bucket: "scans", key: "a.png" }).catch((err: unknown) => err);
    expect(error).toMatchObject({ retryable: true, upstreamStatus: 503 });
  });

  it("rejects an empty body", async () => {
    const storage = createObjectStorage(async () => undefined);
    await expect(storage.getObject({ bucket: "scans", key: "a.png" })).rejects.toThrow(
      "storage returned an empty body for scans/a.png"
    );
  });
});
