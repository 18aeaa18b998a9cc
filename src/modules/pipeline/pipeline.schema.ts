import { z } from "zod";
import { AppError } from "../../middleware/errors";
import type { DocumentSubmission, Thresholds } from "./pipeline.types";

const thresholdSchema = z.number().min(0).max(100);

const sourceSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("file"), file: z.string().min(1) }),
  z.object({ type: z.literal("storage"), url: z.string().min(1) }),
]);

export const ocrRequestSchema = z.object({
  source: sourceSchema,
  processing_options: z
    .object({
      enable_ocr: z.boolean().default(true),
      enable_enhancement: z.boolean().default(false),
      enable_preprocessing: z.boolean().default(true),
      return_format: z.enum(["full", "minimal", "ocr_only"]).default("full"),
    })
    .default({}),
  thresholds: z
    .object({
      image_quality_threshold: thresholdSchema.optional(),
      confidence_threshold: thresholdSchema.optional(),
    })
    .default({}),
  async_processing: z.boolean().default(false),
});

export type OcrRequestBody = z.infer<typeof ocrRequestSchema>;

export function batchRequestSchema(maxBatchSize: number) {
  return z.object({
    documents: z.array(ocrRequestSchema).min(1).max(maxBatchSize),
  });
}

function describeIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

export function invalidRequest(error: z.ZodError, message = "Invalid request."): AppError {
  return new AppError("INVALID_REQUEST", message, 400, { issues: describeIssues(error) });
}

export function toSubmission(body: OcrRequestBody, defaults: Thresholds): DocumentSubmission {
  return {
    source: body.source,
    options: {
      enableOcr: body.processing_options.enable_ocr,
      enableEnhancement: body.processing_options.enable_enhancement,
      enablePreprocessing: body.processing_options.enable_preprocessing,
      returnFormat: body.processing_options.return_format,
    },
    thresholds: {
      qualityThreshold: body.thresholds.image_quality_threshold ?? defaults.qualityThreshold,
      confidenceThreshold: body.thresholds.confidence_threshold ?? defaults.confidenceThreshold,
    },
    async: body.async_processing,
  };
}

export function parseSubmission(body: unknown, defaults: Thresholds): DocumentSubmission {
  const parsed = ocrRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw invalidRequest(parsed.error, "Invalid OCR request.");
  }
  return toSubmission(parsed.data, defaults);
}

export function estimatedTimeSeconds(submission: DocumentSubmission): number {
  return submission.options.enableEnhancement ? 30 : 10;
}
