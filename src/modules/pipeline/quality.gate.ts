import type { CallOptions, DocumentInput, QualityAssessor } from "../providers/providers.types";
import type { QualityAssessment } from "./pipeline.types";

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

export class QualityGate {
  constructor(private readonly assessor: QualityAssessor) {}

  async evaluate(
    input: DocumentInput,
    qualityThreshold: number,
    options?: CallOptions
  ): Promise<QualityAssessment> {
    const raw = await this.assessor.assess(input, options);
    const score = clampScore(raw.score);
    return {
      score,
      metrics: raw.metrics,
      issues: raw.issues,
      passed: score >= qualityThreshold,
    };
  }
}
