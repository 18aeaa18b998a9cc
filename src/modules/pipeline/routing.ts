import type { ConfidenceReport, RoutingDecision, Thresholds } from "./pipeline.types";

export type ReviewPriority = "high" | "medium" | "low";

export const REVIEW_PRIORITIES: readonly ReviewPriority[] = ["high", "medium", "low"];

export type ReviewPriorityRatios = {
  high: number;
  medium: number;
};

export const DEFAULT_REVIEW_PRIORITY_RATIOS: ReviewPriorityRatios = { high: 0.5, medium: 0.85 };

export type RoutingInput = {
  qualityScore: number;
  qualityPassed: boolean;
  ocrConfidenceScore: number | null;
  ocrAttempted: boolean;
  finalConfidence: number;
  thresholds: Thresholds;
};

function percent(score: number): string {
  return `${score.toFixed(1)}%`;
}

export function buildConfidenceReport(input: RoutingInput): ConfidenceReport {
  const confidencePassed = input.finalConfidence >= input.thresholds.confidenceThreshold;
  const failures: string[] = [];

  if (!input.qualityPassed) {
    failures.push(
      `Image quality (${percent(input.qualityScore)}) below threshold (${input.thresholds.qualityThreshold}%)`
    );
  }
  if (!confidencePassed) {
    failures.push(
      `Confidence (${percent(input.finalConfidence)}) below threshold (${input.thresholds.confidenceThreshold}%)`
    );
  }
  if (!input.ocrAttempted) {
    failures.push("OCR was not performed");
  }

  const routingDecision: RoutingDecision = failures.length === 0 ? "pass" : "requires_review";

  return {
    imageQualityScore: input.qualityScore,
    ocrConfidenceScore: input.ocrConfidenceScore,
    finalConfidence: input.finalConfidence,
    qualityCheckPassed: input.qualityPassed,
    confidenceCheckPassed: confidencePassed,
    routingDecision,
    routingReason: failures.length === 0 ? "All thresholds met" : failures.join("; "),
  };
}

export function reviewPriority(
  finalConfidence: number,
  confidenceThreshold: number,
  ratios: ReviewPriorityRatios = DEFAULT_REVIEW_PRIORITY_RATIOS
): ReviewPriority {
  if (finalConfidence < ratios.high * confidenceThreshold) {
    return "high";
  }
  if (finalConfidence < ratios.medium * confidenceThreshold) {
    return "medium";
  }
  return "low";
}

export function priorityRank(priority: ReviewPriority): number {
  return REVIEW_PRIORITIES.indexOf(priority);
}
