import { Router } from "express";
import { z } from "zod";
import { notFoundError } from "../middleware/errors";
import { safeHandler } from "../middleware/safeHandler";
import { toHistoryResponse, toStatisticsResponse } from "../modules/history/history.presenter";
import { invalidRequest } from "../modules/pipeline/pipeline.schema";
import type { AppServices } from "./types";

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

const historyQuerySchema = paginationSchema.extend({
  status: z.enum(["pass", "requires_review", "failed"]).optional(),
  priority: z.enum(["high", "medium", "low"]).optional(),
});

const historyIdSchema = z.string().min(1).max(64);

export function createHistoryRouter(services: AppServices): Router {
  const router = Router();

  router.get(
    "/history-stats",
    safeHandler(async (_req, res) => {
      const stats = await services.history.statistics();
      res.json(toStatisticsResponse(stats, services.history.retentionMs));
    })
  );

  router.post(
    "/history/cleanup",
    safeHandler(async (_req, res) => {
      const deleted = await services.history.purgeExpired();
      res.json({
        status: "success",
        deleted_records: deleted,
        message: `Cleaned up ${deleted} expired records`,
      });
    })
  );

  router.get(
    "/history/id/:historyId",
    safeHandler(async (req, res) => {
      const historyId = historyIdSchema.parse(req.params.historyId);
      const record = await services.history.getById(historyId);
      if (!record) {
        throw notFoundError(`History record ${historyId} not found or expired.`);
      }
      res.json(toHistoryResponse(record));
    })
  );

  router.get(
    "/history/:documentId",
    safeHandler(async (req, res) => {
      const record = await services.history.get(req.params.documentId);
      if (!record) {
        throw notFoundError(`No history found for document ${req.params.documentId}.`);
      }
      res.json(toHistoryResponse(record));
    })
  );

  router.get(
    "/history",
    safeHandler(async (req, res) => {
      const parsed = historyQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw invalidRequest(parsed.error, "Invalid history query.");
      }
      const page = await services.history.query(parsed.data);
      res.json({
        records: page.records.map(toHistoryResponse),
        total: page.total,
        limit: parsed.data.limit,
        offset: parsed.data.offset,
      });
    })
  );

  return router;
}
