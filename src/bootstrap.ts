import {
  getConfidenceWeights,
  getCorsAllowlist,
  getDefaultConfidenceThreshold,
  getDefaultQualityThreshold,
  getHistoryRetentionMs,
  getJobQueueCapacity,
  getJobTimeoutMs,
  getJobWorkerConcurrency,
  getMaxBatchSize,
  getMaxDocumentSizeBytes,
  getReviewPriorityRatios,
  getSupportedFormats,
} from "./config";
import type { Database } from "./db";
import { createPgHistoryRepository } from "./modules/history/history.repo";
import { HistoryService } from "./modules/history/history.service";
import { JobManager } from "./modules/jobs/jobs.manager";
import { createPgJobRepository } from "./modules/jobs/jobs.repo";
import { PipelineController } from "./modules/pipeline/pipeline.service";
import { createRemoteCapabilities } from "./modules/providers/providers.factory";
import type { PipelineCapabilities } from "./modules/providers/providers.types";
import { ReviewQueueService } from "./modules/review/review.service";
import type { AppServices } from "./routes/types";
import { systemClock, type Clock } from "./utils/clock";

export type ServiceOverrides = {
  capabilities?: PipelineCapabilities;
  clock?: Clock;
};

export type Services = AppServices & {
  history: HistoryService;
  jobs: JobManager;
};

/** Wires every service from configuration around the given database. */
export function createServices(db: Database, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock;
  const capabilities = overrides.capabilities ?? createRemoteCapabilities();
  const maxDocumentSizeBytes = getMaxDocumentSizeBytes();
  const timeoutMs = getJobTimeoutMs();

  const history = new HistoryService({
    repository: createPgHistoryRepository(db),
    clock,
    retentionMs: getHistoryRetentionMs(),
    priorityRatios: getReviewPriorityRatios(),
  });
  const pipeline = new PipelineController({
    capabilities,
    history,
    maxDocumentSizeBytes,
    supportedFormats: getSupportedFormats(),
    confidenceWeights: getConfidenceWeights(),
    clock,
  });
  const jobs = new JobManager({
    repository: createPgJobRepository(db),
    pipeline,
    concurrency: getJobWorkerConcurrency(),
    queueCapacity: getJobQueueCapacity(),
    timeoutMs,
    clock,
  });

  return {
    pipeline,
    jobs,
    history,
    reviewQueue: new ReviewQueueService(history),
    clock,
    settings: {
      defaultThresholds: {
        qualityThreshold: getDefaultQualityThreshold(),
        confidenceThreshold: getDefaultConfidenceThreshold(),
      },
      syncTimeoutMs: timeoutMs,
      maxBatchSize: getMaxBatchSize(),
      maxDocumentSizeBytes,
      corsAllowlist: getCorsAllowlist(),
    },
  };
}
