import { describe, expect, it } from "vitest";
import { analyzeWordBlocks, bucketConfidences, countWords } from "../ocr.confidence";

describe("ocr confidence analysis", () => {
  it("buckets word confidences at 0.95, 0.80 and 0.60", () => {
    expect(bucketConfidences([0.99, 0.95, 0.94, 0.8, 0.79, 0.6, 0.59, 0])).toEqual({
      high: 2,
      medium: 2,
      low: 2,
      veryLow: 2,
    });
  });

  it("scores the mean confidence as a percentage", () => {
    const result = analyzeWordBlocks("Total due  42\nEUR", [
      { text: "Total", confidence: 1 },
      { text: "due", confidence: 0.5 },
      { text: "42", confidence: 0.75 },
      { text: "EUR", confidence: 0.25 },
    ]);
    expect(result).toEqual({
      text: "Total due  42\nEUR",
      wordCount: 4,
      confidenceScore: 62.5,
      confidenceDistribution: { high: 1, medium: 0, low: 1, veryLow: 2 },
    });
  });

  it("scores an empty page as zero", () => {
    expect(analyzeWordBlocks("", [])).toEqual({
      text: "",
      wordCount: 0,
      confidenceScore: 0,
      confidenceDistribution: { high: 0, medium: 0, low: 0, veryLow: 0 },
    });
    expect(countWords("   ")).toBe(0);
  });
});
