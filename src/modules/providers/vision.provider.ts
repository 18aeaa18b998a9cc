import { z } from "zod";
import { postJson, type RemoteClientConfig } from "./http.client";
import type { Preprocessor, QualityAssessor } from "./providers.types";

const qualityResponseSchema = z.object({
  score: z.number().min(0).max(100),
  metrics: z.object({
    sharpness: z.number(),
    contrast: z.number(),
    resolution: z.number(),
    noise_level: z.number(),
  }),
  issues: z.array(z.string()).default([]),
});

const preprocessResponseSchema = z.object({
  document: z.string().min(1),
});

export function createHttpQualityAssessor(config: RemoteClientConfig): QualityAssessor {
  return {
    async assess(input, options) {
      const payload = await postJson(
        config,
        "/v1/quality",
        { document: input.bytes.toString("base64"), format: input.format },
        qualityResponseSchema,
        options?.signal
      );
      return {
        score: payload.score,
        metrics: {
          sharpness: payload.metrics.sharpness,
          contrast: payload.metrics.contrast,
          resolution: payload.metrics.resolution,
          noiseLevel: payload.metrics.noise_level,
        },
        issues: payload.issues,
      };
    },
  };
}

export function createHttpPreprocessor(config: RemoteClientConfig): Preprocessor {
  return {
    async preprocess(input, options) {
      const payload = await postJson(
        config,
        "/v1/preprocess",
        { document: input.bytes.toString("base64"), format: input.format },
        preprocessResponseSchema,
        options?.signal
      );
      return Buffer.from(payload.document, "base64");
    },
  };
}
