import { Router } from "express";
import { z } from "zod";
import { safeHandler } from "../middleware/safeHandler";
import type { AppServices } from "./types";

const batchIdSchema = z.string().min(1).max(64);

export function createBatchRouter(services: AppServices): Router {
  const router = Router();

  router.get(
    "/queue/status",
    safeHandler(async (_req, res) => {
      const stats = services.jobs.stats();
      res.json({
        queue_status: {
          active: stats.active,
          queued: stats.queued,
          concurrency: stats.concurrency,
          queue_capacity: stats.queueCapacity,
        },
        max_batch_size: services.settings.maxBatchSize,
      });
    })
  );

  router.get(
    "/:batchId",
    safeHandler(async (req, res) => {
      res.json(await services.jobs.batchStatus(batchIdSchema.parse(req.params.batchId)));
    })
  );

  return router;
}
