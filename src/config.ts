import {
  nonNegativeInt,
  percentage,
  positiveInt,
  ratio,
  readEnv,
  readList,
  readNumber,
  requireEnv,
} from "./config/env";
import { DOCUMENT_FORMATS, type DocumentFormat } from "./modules/pipeline/pipeline.types";

const DAY_MS = 24 * 60 * 60 * 1000;

export function getPort(): number {
  return readNumber("PORT", 3000, positiveInt);
}

export function getDatabaseUrl(): string {
  return requireEnv("DATABASE_URL");
}

export function getCorsAllowlist(): string[] {
  return readList("CORS_ALLOWED_ORIGINS", ["*"]);
}

export function getDefaultQualityThreshold(): number {
  return readNumber("DEFAULT_QUALITY_THRESHOLD", 60, percentage);
}

export function getDefaultConfidenceThreshold(): number {
  return readNumber("DEFAULT_CONFIDENCE_THRESHOLD", 80, percentage);
}

export function getConfidenceWeights(): { quality: number; ocr: number } {
  return {
    quality: readNumber("CONFIDENCE_WEIGHT_QUALITY", 0.5, ratio),
    ocr: readNumber("CONFIDENCE_WEIGHT_OCR", 0.5, ratio),
  };
}

export function getReviewPriorityRatios(): { high: number; medium: number } {
  return {
    high: readNumber("REVIEW_PRIORITY_HIGH_RATIO", 0.5, ratio),
    medium: readNumber("REVIEW_PRIORITY_MEDIUM_RATIO", 0.85, ratio),
  };
}

/** Formats accepted by the source resolver; unknown names are ignored. */
export function getSupportedFormats(): DocumentFormat[] {
  const requested = readList("SUPPORTED_FORMATS", [...DOCUMENT_FORMATS]);
  const formats = DOCUMENT_FORMATS.filter((format) => requested.includes(format));
  return formats.length > 0 ? formats : [...DOCUMENT_FORMATS];
}

export function getJobWorkerConcurrency(): number {
  return readNumber("JOB_WORKER_CONCURRENCY", 4, positiveInt);
}

export function getJobQueueCapacity(): number {
  return readNumber("JOB_QUEUE_CAPACITY", 100, nonNegativeInt);
}

export function getJobTimeoutMs(): number {
  return readNumber("JOB_TIMEOUT_MS", 180_000, positiveInt);
}

export function getHistoryRetentionMs(): number {
  return readNumber("HISTORY_RETENTION_DAYS", 7, positiveInt) * DAY_MS;
}

export function getHistoryCleanupIntervalMs(): number {
  return readNumber("HISTORY_CLEANUP_INTERVAL_MS", 60 * 60 * 1000, positiveInt);
}

export function getMaxDocumentSizeBytes(): number {
  return readNumber("MAX_DOCUMENT_SIZE_BYTES", 10 * 1024 * 1024, positiveInt);
}

export function getMaxBatchSize(): number {
  return readNumber("MAX_BATCH_SIZE", 20, positiveInt);
}

export function getRemoteServiceUrls(): {
  vision: string;
  ocr: string;
  enhancement: string;
} {
  return {
    vision: requireEnv("VISION_SERVICE_URL"),
    ocr: requireEnv("OCR_SERVICE_URL"),
    enhancement: requireEnv("ENHANCEMENT_SERVICE_URL"),
  };
}

export function getRemoteServiceApiKey(): string | undefined {
  return readEnv("REMOTE_SERVICE_API_KEY");
}

export function getRemoteTimeoutMs(): number {
  return readNumber("REMOTE_TIMEOUT_MS", 30_000, positiveInt);
}

export function getRemoteRetryPolicy(): { maxRetries: number; baseDelayMs: number } {
  return {
    maxRetries: readNumber("REMOTE_MAX_RETRIES", 2, nonNegativeInt),
    baseDelayMs: readNumber("REMOTE_RETRY_BASE_MS", 250, positiveInt),
  };
}

export function getStorageConfig(): {
  endpoint: string | undefined;
  region: string;
  credentials: { accessKeyId: string; secretAccessKey: string } | undefined;
} {
  const accessKeyId = readEnv("STORAGE_ACCESS_KEY");
  const secretAccessKey = readEnv("STORAGE_SECRET_KEY");
  return {
    endpoint: readEnv("STORAGE_ENDPOINT"),
    region: readEnv("STORAGE_REGION") ?? "us-east-1",
    credentials:
      accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
  };
}
