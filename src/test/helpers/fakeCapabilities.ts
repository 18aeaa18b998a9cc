import { vi } from "vitest";
import type {
  CallOptions,
  DocumentInput,
  PipelineCapabilities,
  RawQualityAssessment,
  StorageReference,
} from "../../modules/providers/providers.types";
import type { EnhancementResult, OcrResult } from "../../modules/pipeline/pipeline.types";
import type { HistoryRecord, HistoryRecorder, FailedProcessing } from "../../modules/history/history.types";
import type { ProcessingResult } from "../../modules/pipeline/pipeline.types";
import { RemoteServiceError } from "../../modules/pipeline/pipeline.errors";
import { OCR_RESULT } from "./fixtures";

export const QUALITY_METRICS = {
  sharpness: 85,
  contrast: 80,
  resolution: 82,
  noiseLevel: 5,
};

export type FakeCapabilityConfig = {
  /** Consumed in order; the last score repeats. */
  qualityScores?: number[];
  ocr?: OcrResult | Error;
  enhancement?: EnhancementResult | Error;
  preprocessed?: Buffer | Error;
  objects?: Record<string, Buffer>;
};

function resolveOrThrow<T>(value: T | Error): Promise<T> {
  return value instanceof Error ? Promise.reject(value) : Promise.resolve(value);
}

export function createFakeCapabilities(config: FakeCapabilityConfig = {}) {
  const scores = [...(config.qualityScores ?? [82.5])];

  const assess = vi.fn(
    async (_input: DocumentInput, _options?: CallOptions): Promise<RawQualityAssessment> => {
      const score = scores.length > 1 ? scores.shift() ?? 0 : scores[0] ?? 0;
      return { score, metrics: QUALITY_METRICS, issues: score < 60 ? ["low_contrast"] : [] };
    }
  );
  const preprocess = vi.fn((input: DocumentInput, _options?: CallOptions) =>
    resolveOrThrow(config.preprocessed ?? Buffer.concat([input.bytes, Buffer.from("-clean")]))
  );
  const extractText = vi.fn((_input: DocumentInput, _options?: CallOptions) =>
    resolveOrThrow(config.ocr ?? OCR_RESULT)
  );
  const enhance = vi.fn((text: string, _options?: CallOptions) =>
    resolveOrThrow(
      config.enhancement ?? { enhancedText: text.toUpperCase(), corrections: [], tokensUsed: 7 }
    )
  );
  const getObject = vi.fn(async (ref: StorageReference, _options?: CallOptions) => {
    const object = config.objects?.[`${ref.bucket}/${ref.key}`];
    if (!object) {
      throw new RemoteServiceError({
        service: "storage",
        message: `storage responded 404 for ${ref.bucket}/${ref.key}`,
        retryable: false,
        upstreamStatus: 404,
      });
    }
    return object;
  });

  const capabilities: PipelineCapabilities = {
    storage: { getObject },
    qualityAssessor: { assess },
    preprocessor: { preprocess },
    ocrEngine: { extractText },
    textEnhancer: { enhance },
  };

  return { capabilities, assess, preprocess, extractText, enhance, getObject };
}

/** Collects what the pipeline records without a database. */
export function createRecordingHistory() {
  const results: ProcessingResult[] = [];
  const failures: FailedProcessing[] = [];

  function record(documentId: string): HistoryRecord {
    const now = new Date(0);
    return {
      historyId: `history-${results.length + failures.length}`,
      documentId,
      status: "pass",
      format: null,
      sizeBytes: null,
      routingDecision: null,
      routingReason: null,
      finalConfidence: null,
      confidenceThreshold: null,
      priority: null,
      extractedText: null,
      processingTimeMs: 0,
      errorCode: null,
      errorMessage: null,
      result: null,
      createdAt: now,
      expiresAt: now,
    };
  }

  const history: HistoryRecorder = {
    recordResult: async (result) => {
      results.push(result);
      return record(result.documentId);
    },
    recordFailure: async (failure) => {
      failures.push(failure);
      return record(failure.documentId);
    },
  };

  return { history, results, failures };
}
