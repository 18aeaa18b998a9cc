import type { ConfidenceDistribution, OcrResult } from "../pipeline/pipeline.types";

export type WordBlock = {
  text: string;
  confidence: number;
};

const HIGH_CONFIDENCE = 0.95;
const MEDIUM_CONFIDENCE = 0.8;
const LOW_CONFIDENCE = 0.6;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function bucketConfidences(confidences: number[]): ConfidenceDistribution {
  const distribution: ConfidenceDistribution = { high: 0, medium: 0, low: 0, veryLow: 0 };
  for (const confidence of confidences) {
    if (confidence >= HIGH_CONFIDENCE) {
      distribution.high += 1;
    } else if (confidence >= MEDIUM_CONFIDENCE) {
      distribution.medium += 1;
    } else if (confidence >= LOW_CONFIDENCE) {
      distribution.low += 1;
    } else {
      distribution.veryLow += 1;
    }
  }
  return distribution;
}

/**
 * Word confidences arrive in [0, 1]; the score is their mean as a percentage.
 * A page with no recognised words scores 0.
 */
export function analyzeWordBlocks(text: string, words: WordBlock[]): OcrResult {
  const confidences = words.map((word) => Math.min(1, Math.max(0, word.confidence)));
  const mean =
    confidences.length > 0
      ? confidences.reduce((sum, value) => sum + value, 0) / confidences.length
      : 0;
  return {
    text,
    wordCount: countWords(text),
    confidenceScore: mean * 100,
    confidenceDistribution: bucketConfidences(confidences),
  };
}
