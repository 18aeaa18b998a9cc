import express, { Router } from "express";
import { z } from "zod";
import { bindDocumentId } from "../middleware/requestContext";
import { safeHandler } from "../middleware/safeHandler";
import { processWithDeadline } from "../modules/pipeline/pipeline.service";
import {
  batchRequestSchema,
  estimatedTimeSeconds,
  invalidRequest,
  parseSubmission,
  toSubmission,
} from "../modules/pipeline/pipeline.schema";
import { InvalidSourceError } from "../modules/pipeline/pipeline.errors";
import { projectResult } from "../modules/pipeline/response.builder";
import { assertValidSource } from "../modules/pipeline/source.resolver";
import { generateBatchId, generateDocumentId } from "../utils/ids";
import type { AppServices } from "./types";

const JSON_OVERHEAD_BYTES = 64 * 1024;

// base64 inflates payloads by a third
function jsonLimitFor(documents: number, maxDocumentSizeBytes: number): number {
  return documents * (Math.ceil((maxDocumentSizeBytes * 4) / 3) + JSON_OVERHEAD_BYTES);
}

const jobIdSchema = z.string().min(1).max(64);

export function createOcrRouter(services: AppServices): Router {
  const router = Router();
  const { settings } = services;

  router.post(
    "/",
    express.json({ limit: jsonLimitFor(1, settings.maxDocumentSizeBytes) }),
    safeHandler(async (req, res) => {
      const submission = parseSubmission(req.body, settings.defaultThresholds);
      assertValidSource(submission.source);

      if (submission.async) {
        const accepted = await services.jobs.submit(submission);
        res.status(202).json({
          status: "accepted",
          job_id: accepted.jobId,
          message: "Document submitted for processing",
          estimated_time_seconds: estimatedTimeSeconds(submission),
        });
        return;
      }

      const documentId = generateDocumentId();
      bindDocumentId(documentId);
      const result = await processWithDeadline(services.pipeline, submission, {
        documentId,
        timeoutMs: settings.syncTimeoutMs,
      });
      res.status(200).json(projectResult(result, submission.options.returnFormat));
    })
  );

  router.post(
    "/batch",
    express.json({ limit: jsonLimitFor(settings.maxBatchSize, settings.maxDocumentSizeBytes) }),
    safeHandler(async (req, res) => {
      const parsed = batchRequestSchema(settings.maxBatchSize).safeParse(req.body ?? {});
      if (!parsed.success) {
        throw invalidRequest(parsed.error, "Invalid batch request.");
      }

      const submissions = parsed.data.documents.map((document, index) => {
        const submission = toSubmission(document, settings.defaultThresholds);
        try {
          assertValidSource(submission.source);
        } catch (err) {
          if (err instanceof InvalidSourceError) {
            throw new InvalidSourceError(err.message, { ...err.details, document_index: index });
          }
          throw err;
        }
        return submission;
      });

      const batchId = generateBatchId();
      const accepted = await services.jobs.submitMany(submissions, batchId);
      res.status(202).json({
        batch_id: batchId,
        job_ids: accepted.map((job) => job.jobId),
        total_documents: accepted.length,
        status: "accepted",
      });
    })
  );

  router.get(
    "/job/:jobId",
    safeHandler(async (req, res) => {
      res.json(await services.jobs.status(jobIdSchema.parse(req.params.jobId)));
    })
  );

  router.delete(
    "/job/:jobId",
    safeHandler(async (req, res) => {
      const jobId = jobIdSchema.parse(req.params.jobId);
      await services.jobs.remove(jobId);
      res.json({ status: "cancelled", job_id: jobId });
    })
  );

  return router;
}
