import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { describeError } from "../../observability/logger";
import { RemoteServiceError } from "../pipeline/pipeline.errors";
import type { ObjectStorage, StorageReference } from "./providers.types";

const STORAGE_SCHEMES = ["obs:", "s3:"];

/**
 * Parses `obs://bucket/key` and `s3://bucket/key`. Returns null for anything
 * else, including references with an empty bucket or key.
 */
export function parseStorageReference(url: string): StorageReference | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (!STORAGE_SCHEMES.includes(parsed.protocol)) {
    return null;
  }
  const bucket = parsed.hostname;
  const key = decodeURIComponent(parsed.pathname.replace(/^\/+/, ""));
  if (!bucket || !key) {
    return null;
  }
  return { bucket, key };
}

export type S3StorageConfig = {
  endpoint: string | undefined;
  region: string;
  credentials: { accessKeyId: string; secretAccessKey: string } | undefined;
};

export type ObjectBodyReader = (
  ref: StorageReference,
  signal?: AbortSignal
) => Promise<Uint8Array | undefined>;

export function createS3BodyReader(config: S3StorageConfig): ObjectBodyReader {
  const client = new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    credentials: config.credentials,
    forcePathStyle: Boolean(config.endpoint),
  });
  return async (ref, signal) => {
    const output = await client.send(new GetObjectCommand({ Bucket: ref.bucket, Key: ref.key }), {
      abortSignal: signal,
    });
    return output.Body?.transformToByteArray();
  };
}

const STATUS_BY_ERROR_NAME: Record<string, number> = {
  NoSuchKey: 404,
  NoSuchBucket: 404,
  NotFound: 404,
  AccessDenied: 403,
};

function readHttpStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) {
    return null;
  }
  if ("$metadata" in err) {
    const metadata = err.$metadata;
    if (typeof metadata === "object" && metadata !== null && "httpStatusCode" in metadata) {
      const status = metadata.httpStatusCode;
      if (typeof status === "number") {
        return status;
      }
    }
  }
  if ("name" in err && typeof err.name === "string") {
    return STATUS_BY_ERROR_NAME[err.name] ?? null;
  }
  return null;
}

export function createObjectStorage(readBody: ObjectBodyReader): ObjectStorage {
  return {
    async getObject(ref, options) {
      let body: Uint8Array | undefined;
      try {
        body = await readBody(ref, options?.signal);
      } catch (err) {
        const status = readHttpStatus(err);
        throw new RemoteServiceError({
          service: "storage",
          message: `storage fetch failed for ${ref.bucket}/${ref.key}: ${describeError(err)}`,
          retryable: status === null || status === 429 || status >= 500,
          upstreamStatus: status,
        });
      }
      if (!body) {
        throw new RemoteServiceError({
          service: "storage",
          message: `storage returned an empty body for ${ref.bucket}/${ref.key}`,
          retryable: false,
        });
      }
      return Buffer.from(body);
    },
  };
}
