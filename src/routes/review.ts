import { Router } from "express";
import { z } from "zod";
import { safeHandler } from "../middleware/safeHandler";
import { toHistoryResponse } from "../modules/history/history.presenter";
import { invalidRequest } from "../modules/pipeline/pipeline.schema";
import { paginationSchema } from "./history";
import type { AppServices } from "./types";

const reviewQuerySchema = paginationSchema.extend({
  priority: z.enum(["high", "medium", "low"]).optional(),
});

export function createReviewRouter(services: AppServices): Router {
  const router = Router();

  router.get(
    "/manual-review",
    safeHandler(async (req, res) => {
      const parsed = reviewQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw invalidRequest(parsed.error, "Invalid review queue query.");
      }
      const page = await services.reviewQueue.list(parsed.data);
      res.json({
        documents: page.documents.map(toHistoryResponse),
        total: page.total,
        limit: page.limit,
        offset: page.offset,
      });
    })
  );

  return router;
}
