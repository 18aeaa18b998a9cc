import type {
  DocumentSubmission,
  EnhancementResult,
  OcrResult,
  ProcessingOptions,
  SourceDescriptor,
  Thresholds,
} from "../../modules/pipeline/pipeline.types";
import type { Clock } from "../../utils/clock";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export const PNG_BYTES = Buffer.concat([Buffer.from(PNG_SIGNATURE), Buffer.from("test-image-body")]);
export const PNG_BASE64 = PNG_BYTES.toString("base64");
export const TEXT_BASE64 = Buffer.from("just some plain text").toString("base64");

export const OCR_RESULT: OcrResult = {
  text: "Invoice total 42",
  wordCount: 3,
  confidenceScore: 94.5,
  confidenceDistribution: { high: 2, medium: 1, low: 0, veryLow: 0 },
};

export const ENHANCEMENT_RESULT: EnhancementResult = {
  enhancedText: "Invoice total: 42",
  corrections: [{ original: "total", corrected: "total:", confidence: 0.9, type: "punctuation" }],
  tokensUsed: 12,
};

export function buildSubmission(
  overrides: {
    source?: SourceDescriptor;
    options?: Partial<ProcessingOptions>;
    thresholds?: Partial<Thresholds>;
    async?: boolean;
  } = {}
): DocumentSubmission {
  return {
    source: overrides.source ?? { type: "file", file: PNG_BASE64 },
    options: {
      enableOcr: true,
      enableEnhancement: false,
      enablePreprocessing: true,
      returnFormat: "full",
      ...overrides.options,
    },
    thresholds: {
      qualityThreshold: 60,
      confidenceThreshold: 80,
      ...overrides.thresholds,
    },
    async: overrides.async ?? false,
  };
}

export type ManualClock = Clock & {
  set: (date: Date) => void;
  advance: (ms: number) => void;
};

export const FIXED_NOW = new Date("2026-03-02T10:00:00.000Z");

export function manualClock(start: Date = FIXED_NOW): ManualClock {
  let current = new Date(start.getTime());
  return {
    now: () => new Date(current.getTime()),
    set: (date) => {
      current = new Date(date.getTime());
    },
    advance: (ms) => {
      current = new Date(current.getTime() + ms);
    },
  };
}
