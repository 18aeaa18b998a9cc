import { logInfo } from "../../observability/logger";
import type {
  CallOptions,
  ObjectStorage,
  StorageReference,
} from "../providers/providers.types";
import { parseStorageReference } from "../providers/storage.provider";
import { detectDocumentFormat } from "./format.detector";
import { FormatNotSupportedError, InvalidSourceError, RemoteServiceError } from "./pipeline.errors";
import {
  DOCUMENT_FORMATS,
  type DocumentFormat,
  type ResolvedSource,
  type SourceDescriptor,
} from "./pipeline.types";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const DATA_URL_PATTERN = /^data:[^;,]*;base64,/i;

/** Storage answers that mean the reference itself is bad, not the service. */
const UNAVAILABLE_OBJECT_STATUSES = [403, 404];

export type SourceResolverOptions = {
  storage: ObjectStorage;
  maxSizeBytes: number;
  supportedFormats?: readonly DocumentFormat[];
};

export function decodeInlinePayload(payload: string): Buffer {
  const body = payload.replace(DATA_URL_PATTERN, "").replace(/\s+/g, "");
  if (body.length === 0) {
    throw new InvalidSourceError("Inline document payload is empty.");
  }
  if (body.length % 4 !== 0 || !BASE64_PATTERN.test(body)) {
    throw new InvalidSourceError("Inline document payload is not valid base64.");
  }
  return Buffer.from(body, "base64");
}

function requireStorageReference(url: string): StorageReference {
  const ref = parseStorageReference(url);
  if (!ref) {
    throw new InvalidSourceError(
      "Storage reference must look like obs://bucket/key or s3://bucket/key.",
      { url }
    );
  }
  return ref;
}

export class SourceResolver {
  private readonly supportedFormats: readonly DocumentFormat[];

  constructor(private readonly options: SourceResolverOptions) {
    this.supportedFormats = options.supportedFormats ?? DOCUMENT_FORMATS;
  }

  async resolve(source: SourceDescriptor, callOptions?: CallOptions): Promise<ResolvedSource> {
    const bytes = await this.loadBytes(source, callOptions);
    if (bytes.length === 0) {
      throw new InvalidSourceError("Document is empty.");
    }
    if (bytes.length > this.options.maxSizeBytes) {
      throw new InvalidSourceError(
        `Document exceeds the ${this.options.maxSizeBytes} byte limit.`,
        { size_bytes: bytes.length, max_size_bytes: this.options.maxSizeBytes }
      );
    }

    const format = detectDocumentFormat(bytes);
    if (!format || !this.supportedFormats.includes(format)) {
      throw new FormatNotSupportedError(format, this.supportedFormats);
    }

    return { bytes, format, sizeBytes: bytes.length };
  }

  private async loadBytes(source: SourceDescriptor, callOptions?: CallOptions): Promise<Buffer> {
    if (source.type === "file") {
      return decodeInlinePayload(source.file);
    }
    const ref = requireStorageReference(source.url);
    logInfo("storage_fetch_started", { bucket: ref.bucket, key: ref.key });
    try {
      return await this.options.storage.getObject(ref, callOptions);
    } catch (err) {
      if (
        err instanceof RemoteServiceError &&
        err.upstreamStatus !== null &&
        UNAVAILABLE_OBJECT_STATUSES.includes(err.upstreamStatus)
      ) {
        throw new InvalidSourceError(
          `Storage object ${ref.bucket}/${ref.key} is not available (status ${err.upstreamStatus}).`,
          { url: source.url, upstream_status: err.upstreamStatus }
        );
      }
      throw err;
    }
  }
}

/** Rejects malformed descriptors before any stage runs. */
export function assertValidSource(source: SourceDescriptor): void {
  if (source.type === "file") {
    decodeInlinePayload(source.file);
    return;
  }
  requireStorageReference(source.url);
}
