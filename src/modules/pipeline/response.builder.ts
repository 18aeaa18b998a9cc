import type { ProcessingResult, ReturnFormat, StageName, StageRecord } from "./pipeline.types";

export const RESPONSE_VERSION = "1.0";

export type StageResponse = {
  name: StageName;
  status: StageRecord["status"];
  reason?: string;
  duration_ms: number;
};

export type FullResponse = {
  status: "success";
  quality_check: {
    performed: true;
    passed: boolean;
    score: number;
    metrics: {
      sharpness: number;
      contrast: number;
      resolution: number;
      noise_level: number;
    };
    issues: string[];
    processing_time_ms: number;
  };
  preprocessing: {
    applied: boolean;
    initial_score: number | null;
    processing_time_ms: number | null;
  };
  ocr_result: {
    raw_text: string;
    word_count: number;
    confidence_score: number;
    confidence_distribution: {
      high: number;
      medium: number;
      low: number;
      very_low: number;
    };
    processing_time_ms: number;
  } | null;
  enhancement: {
    performed: boolean;
    enhanced_text: string | null;
    corrections: Array<{ original: string; corrected: string; confidence: number; type: string }>;
    processing_time_ms: number | null;
    tokens_used: number | null;
  } | null;
  confidence_report: {
    image_quality_score: number;
    ocr_confidence_score: number | null;
    final_confidence: number;
    thresholds_applied: {
      image_quality_threshold: number;
      confidence_threshold: number;
    };
    routing_decision: "pass" | "requires_review";
    routing_reason: string;
    quality_check_passed: boolean;
    confidence_check_passed: boolean;
  };
  stages: StageResponse[];
  warnings: string[];
  metadata: {
    document_id: string;
    timestamp: string;
    version: typeof RESPONSE_VERSION;
    processing_time_ms: number;
  };
};

export type MinimalResponse = {
  status: "success";
  extracted_text: string;
  routing_decision: "pass" | "requires_review";
  confidence_score: number;
  document_id: string;
};

export type OcrOnlyResponse = {
  status: "success";
  raw_text: string;
  word_count: number;
  ocr_confidence: number;
  processing_time_ms: number;
  document_id: string;
};

export type ProcessingResponse = FullResponse | MinimalResponse | OcrOnlyResponse;

function stageDuration(result: ProcessingResult, name: StageName): number | null {
  const stage = result.stages.find((entry) => entry.name === name);
  return stage && stage.status !== "skipped" ? stage.durationMs : null;
}

export function finalText(result: ProcessingResult): string {
  return result.enhancement?.enhancedText ?? result.ocr?.text ?? "";
}

export function buildFullResponse(result: ProcessingResult): FullResponse {
  const { quality, ocr, enhancement, confidence } = result;
  return {
    status: "success",
    quality_check: {
      performed: true,
      passed: quality.passed,
      score: quality.score,
      metrics: {
        sharpness: quality.metrics.sharpness,
        contrast: quality.metrics.contrast,
        resolution: quality.metrics.resolution,
        noise_level: quality.metrics.noiseLevel,
      },
      issues: quality.issues,
      processing_time_ms: stageDuration(result, "quality_gate") ?? 0,
    },
    preprocessing: {
      applied: result.preprocessingApplied,
      initial_score: result.initialQuality?.score ?? null,
      processing_time_ms: stageDuration(result, "preprocessing"),
    },
    ocr_result: ocr
      ? {
          raw_text: ocr.text,
          word_count: ocr.wordCount,
          confidence_score: ocr.confidenceScore,
          confidence_distribution: {
            high: ocr.confidenceDistribution.high,
            medium: ocr.confidenceDistribution.medium,
            low: ocr.confidenceDistribution.low,
            very_low: ocr.confidenceDistribution.veryLow,
          },
          processing_time_ms: stageDuration(result, "ocr") ?? 0,
        }
      : null,
    enhancement: result.options.enableEnhancement
      ? {
          performed: enhancement !== null,
          enhanced_text: enhancement?.enhancedText ?? null,
          corrections: enhancement?.corrections ?? [],
          processing_time_ms: stageDuration(result, "enhancement"),
          tokens_used: enhancement?.tokensUsed ?? null,
        }
      : null,
    confidence_report: {
      image_quality_score: confidence.imageQualityScore,
      ocr_confidence_score: confidence.ocrConfidenceScore,
      final_confidence: confidence.finalConfidence,
      thresholds_applied: {
        image_quality_threshold: result.thresholds.qualityThreshold,
        confidence_threshold: result.thresholds.confidenceThreshold,
      },
      routing_decision: confidence.routingDecision,
      routing_reason: confidence.routingReason,
      quality_check_passed: confidence.qualityCheckPassed,
      confidence_check_passed: confidence.confidenceCheckPassed,
    },
    stages: result.stages.map((stage) => ({
      name: stage.name,
      status: stage.status,
      ...(stage.reason ? { reason: stage.reason } : {}),
      duration_ms: stage.durationMs,
    })),
    warnings: result.warnings,
    metadata: {
      document_id: result.documentId,
      timestamp: result.createdAt.toISOString(),
      version: RESPONSE_VERSION,
      processing_time_ms: result.totalTimeMs,
    },
  };
}

export function buildMinimalResponse(result: ProcessingResult): MinimalResponse {
  return {
    status: "success",
    extracted_text: finalText(result),
    routing_decision: result.confidence.routingDecision,
    confidence_score: result.confidence.finalConfidence,
    document_id: result.documentId,
  };
}

export function buildOcrOnlyResponse(result: ProcessingResult): OcrOnlyResponse {
  return {
    status: "success",
    raw_text: result.ocr?.text ?? "",
    word_count: result.ocr?.wordCount ?? 0,
    ocr_confidence: result.ocr?.confidenceScore ?? 0,
    processing_time_ms: result.totalTimeMs,
    document_id: result.documentId,
  };
}

export function projectResult(result: ProcessingResult, format: ReturnFormat): ProcessingResponse {
  switch (format) {
    case "minimal":
      return buildMinimalResponse(result);
    case "ocr_only":
      return buildOcrOnlyResponse(result);
    case "full":
      return buildFullResponse(result);
  }
}
