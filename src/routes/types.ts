import type { HistoryService } from "../modules/history/history.service";
import type { JobManager } from "../modules/jobs/jobs.manager";
import type { PipelineController } from "../modules/pipeline/pipeline.service";
import type { Thresholds } from "../modules/pipeline/pipeline.types";
import type { ReviewQueueService } from "../modules/review/review.service";
import type { Clock } from "../utils/clock";

export type AppSettings = {
  defaultThresholds: Thresholds;
  syncTimeoutMs: number;
  maxBatchSize: number;
  maxDocumentSizeBytes: number;
  corsAllowlist: string[];
};

export type AppServices = {
  pipeline: Pick<PipelineController, "process">;
  jobs: Pick<JobManager, "submit" | "submitMany" | "status" | "batchStatus" | "remove" | "stats">;
  history: Pick<
    HistoryService,
    "get" | "getById" | "query" | "statistics" | "purgeExpired" | "retentionMs"
  >;
  reviewQueue: Pick<ReviewQueueService, "list">;
  clock: Clock;
  settings: AppSettings;
};
