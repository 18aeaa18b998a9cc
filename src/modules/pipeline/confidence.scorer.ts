export type ConfidenceWeights = {
  quality: number;
  ocr: number;
};

export const DEFAULT_CONFIDENCE_WEIGHTS: ConfidenceWeights = { quality: 0.5, ocr: 0.5 };

/**
 * Two-factor blend of image quality and OCR confidence. Without an OCR score
 * the quality score is used on its own.
 */
export function computeFinalConfidence(
  qualityScore: number,
  ocrConfidenceScore: number | null,
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS
): number {
  if (ocrConfidenceScore === null) {
    return clamp(qualityScore);
  }
  const total = weights.quality + weights.ocr;
  if (total <= 0) {
    return clamp(qualityScore);
  }
  return clamp((weights.quality * qualityScore + weights.ocr * ocrConfidenceScore) / total);
}

function clamp(score: number): number {
  return Math.min(100, Math.max(0, score));
}
