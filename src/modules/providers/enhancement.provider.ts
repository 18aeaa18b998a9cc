import { z } from "zod";
import { postJson, type RemoteClientConfig } from "./http.client";
import type { TextEnhancer } from "./providers.types";

const enhanceResponseSchema = z.object({
  enhanced_text: z.string(),
  corrections: z
    .array(
      z.object({
        original: z.string(),
        corrected: z.string(),
        confidence: z.number(),
        type: z.string(),
      })
    )
    .default([]),
  tokens_used: z.number().int().nonnegative().default(0),
});

export function createHttpTextEnhancer(config: RemoteClientConfig): TextEnhancer {
  return {
    async enhance(text, options) {
      const payload = await postJson(
        config,
        "/v1/enhance",
        { text },
        enhanceResponseSchema,
        options?.signal
      );
      return {
        enhancedText: payload.enhanced_text,
        corrections: payload.corrections,
        tokensUsed: payload.tokens_used,
      };
    },
  };
}
