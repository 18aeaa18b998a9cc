export const DOCUMENT_FORMATS = [
  "png",
  "jpg",
  "bmp",
  "gif",
  "tiff",
  "webp",
  "ico",
  "psd",
  "pdf",
  "pcx",
] as const;

export type DocumentFormat = (typeof DOCUMENT_FORMATS)[number];

export type ReturnFormat = "full" | "minimal" | "ocr_only";

export type SourceDescriptor =
  | { type: "file"; file: string }
  | { type: "storage"; url: string };

export type ProcessingOptions = {
  enableOcr: boolean;
  enableEnhancement: boolean;
  enablePreprocessing: boolean;
  returnFormat: ReturnFormat;
};

export type Thresholds = {
  qualityThreshold: number;
  confidenceThreshold: number;
};

export type DocumentSubmission = Readonly<{
  source: SourceDescriptor;
  options: Readonly<ProcessingOptions>;
  thresholds: Readonly<Thresholds>;
  async: boolean;
}>;

export type ResolvedSource = {
  bytes: Buffer;
  format: DocumentFormat;
  sizeBytes: number;
};

export type QualityMetrics = {
  sharpness: number;
  contrast: number;
  resolution: number;
  noiseLevel: number;
};

export type QualityAssessment = {
  score: number;
  metrics: QualityMetrics;
  issues: string[];
  passed: boolean;
};

export type ConfidenceDistribution = {
  high: number;
  medium: number;
  low: number;
  veryLow: number;
};

export type OcrResult = {
  text: string;
  wordCount: number;
  confidenceScore: number;
  confidenceDistribution: ConfidenceDistribution;
};

export type Correction = {
  original: string;
  corrected: string;
  confidence: number;
  type: string;
};

export type EnhancementResult = {
  enhancedText: string;
  corrections: Correction[];
  tokensUsed: number;
};

export type RoutingDecision = "pass" | "requires_review";

export type ConfidenceReport = Readonly<{
  imageQualityScore: number;
  ocrConfidenceScore: number | null;
  finalConfidence: number;
  qualityCheckPassed: boolean;
  confidenceCheckPassed: boolean;
  routingDecision: RoutingDecision;
  routingReason: string;
}>;

export type StageName = "resolve_source" | "quality_gate" | "preprocessing" | "ocr" | "enhancement";

export type StageRecord = {
  name: StageName;
  status: "completed" | "skipped" | "failed";
  reason?: string;
  durationMs: number;
};

export type ProcessingResult = {
  documentId: string;
  createdAt: Date;
  format: DocumentFormat;
  sizeBytes: number;
  thresholds: Thresholds;
  options: ProcessingOptions;
  quality: QualityAssessment;
  initialQuality: QualityAssessment | null;
  preprocessingApplied: boolean;
  ocr: OcrResult | null;
  enhancement: EnhancementResult | null;
  confidence: ConfidenceReport;
  stages: StageRecord[];
  warnings: string[];
  totalTimeMs: number;
};
