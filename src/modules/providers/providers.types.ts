import type {
  DocumentFormat,
  EnhancementResult,
  OcrResult,
  QualityMetrics,
} from "../pipeline/pipeline.types";

export type CallOptions = {
  signal?: AbortSignal;
};

export type DocumentInput = {
  bytes: Buffer;
  format: DocumentFormat;
};

export type RawQualityAssessment = {
  score: number;
  metrics: QualityMetrics;
  issues: string[];
};

export type QualityAssessor = {
  assess: (input: DocumentInput, options?: CallOptions) => Promise<RawQualityAssessment>;
};

export type Preprocessor = {
  preprocess: (input: DocumentInput, options?: CallOptions) => Promise<Buffer>;
};

export type OcrEngine = {
  extractText: (input: DocumentInput, options?: CallOptions) => Promise<OcrResult>;
};

export type TextEnhancer = {
  enhance: (text: string, options?: CallOptions) => Promise<EnhancementResult>;
};

export type StorageReference = {
  bucket: string;
  key: string;
};

export type ObjectStorage = {
  getObject: (ref: StorageReference, options?: CallOptions) => Promise<Buffer>;
};

export type PipelineCapabilities = {
  storage: ObjectStorage;
  qualityAssessor: QualityAssessor;
  preprocessor: Preprocessor;
  ocrEngine: OcrEngine;
  textEnhancer: TextEnhancer;
};
