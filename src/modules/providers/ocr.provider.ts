import { z } from "zod";
import { postJson, type RemoteClientConfig } from "./http.client";
import { analyzeWordBlocks } from "./ocr.confidence";
import type { OcrEngine } from "./providers.types";

const extractResponseSchema = z.object({
  text: z.string(),
  words: z
    .array(
      z.object({
        text: z.string(),
        confidence: z.number(),
      })
    )
    .default([]),
});

export function createHttpOcrEngine(config: RemoteClientConfig): OcrEngine {
  return {
    async extractText(input, options) {
      const payload = await postJson(
        config,
        "/v1/extract",
        { document: input.bytes.toString("base64"), format: input.format },
        extractResponseSchema,
        options?.signal
      );
      return analyzeWordBlocks(payload.text, payload.words);
    },
  };
}
