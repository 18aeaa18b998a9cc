import { describeError, logError, logInfo } from "../../observability/logger";
import { systemClock, type Clock } from "../../utils/clock";
import { finalText, buildFullResponse } from "../pipeline/response.builder";
import type { ProcessingResult } from "../pipeline/pipeline.types";
import {
  DEFAULT_REVIEW_PRIORITY_RATIOS,
  reviewPriority,
  type ReviewPriorityRatios,
} from "../pipeline/routing";
import type {
  FailedProcessing,
  HistoryFilters,
  HistoryPage,
  HistoryRecord,
  HistoryRecorder,
  HistoryRepository,
  HistoryStatistics,
} from "./history.types";

export const DEFAULT_HISTORY_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

export type HistoryServiceOptions = {
  repository: HistoryRepository;
  clock?: Clock;
  retentionMs?: number;
  priorityRatios?: ReviewPriorityRatios;
};

export class HistoryService implements HistoryRecorder {
  private readonly repository: HistoryRepository;
  private readonly clock: Clock;
  readonly retentionMs: number;
  private readonly priorityRatios: ReviewPriorityRatios;

  constructor(options: HistoryServiceOptions) {
    this.repository = options.repository;
    this.clock = options.clock ?? systemClock;
    this.retentionMs = options.retentionMs ?? DEFAULT_HISTORY_RETENTION_MS;
    this.priorityRatios = options.priorityRatios ?? DEFAULT_REVIEW_PRIORITY_RATIOS;
  }

  async recordResult(result: ProcessingResult): Promise<HistoryRecord> {
    const createdAt = this.clock.now();
    const decision = result.confidence.routingDecision;
    const record = await this.repository.insert(
      {
        documentId: result.documentId,
        status: decision,
        format: result.format,
        sizeBytes: result.sizeBytes,
        routingDecision: decision,
        routingReason: result.confidence.routingReason,
        finalConfidence: result.confidence.finalConfidence,
        confidenceThreshold: result.thresholds.confidenceThreshold,
        priority:
          decision === "requires_review"
            ? reviewPriority(
                result.confidence.finalConfidence,
                result.thresholds.confidenceThreshold,
                this.priorityRatios
              )
            : null,
        extractedText: result.ocr ? finalText(result) : null,
        processingTimeMs: result.totalTimeMs,
        errorCode: null,
        errorMessage: null,
        result: buildFullResponse(result),
        createdAt,
        expiresAt: new Date(createdAt.getTime() + this.retentionMs),
      },
      createdAt
    );
    logInfo("history_recorded", {
      documentId: record.documentId,
      status: record.status,
      priority: record.priority,
    });
    return record;
  }

  async recordFailure(failure: FailedProcessing): Promise<HistoryRecord> {
    const createdAt = this.clock.now();
    const record = await this.repository.insert(
      {
        documentId: failure.documentId,
        status: "failed",
        format: failure.format,
        sizeBytes: failure.sizeBytes,
        routingDecision: null,
        routingReason: null,
        finalConfidence: null,
        confidenceThreshold: failure.confidenceThreshold,
        priority: null,
        extractedText: null,
        processingTimeMs: failure.processingTimeMs,
        errorCode: failure.errorCode,
        errorMessage: failure.errorMessage,
        result: null,
        createdAt,
        expiresAt: new Date(createdAt.getTime() + this.retentionMs),
      },
      createdAt
    );
    logInfo("history_failure_recorded", {
      documentId: record.documentId,
      errorCode: failure.errorCode,
    });
    return record;
  }

  get(documentId: string): Promise<HistoryRecord | null> {
    return this.repository.findLatestByDocumentId(documentId, this.clock.now());
  }

  getById(historyId: string): Promise<HistoryRecord | null> {
    return this.repository.findById(historyId, this.clock.now());
  }

  query(filters: HistoryFilters): Promise<HistoryPage> {
    return this.repository.query(filters, this.clock.now());
  }

  statistics(): Promise<HistoryStatistics> {
    return this.repository.statistics(this.clock.now());
  }

  async purgeExpired(): Promise<number> {
    const removed = await this.repository.deleteExpired(this.clock.now());
    if (removed > 0) {
      logInfo("history_expired_removed", { removed });
    }
    return removed;
  }
}

export type HistoryCleanupHandle = {
  stop: () => void;
};

/** Periodically removes expired history records until stopped. */
export function startHistoryCleanup(
  history: Pick<HistoryService, "purgeExpired">,
  intervalMs: number
): HistoryCleanupHandle {
  let running = false;
  const timer = setInterval(() => {
    if (running) {
      return;
    }
    running = true;
    history
      .purgeExpired()
      .catch((err: unknown) => {
        logError("history_cleanup_failed", {
          error: describeError(err),
        });
      })
      .finally(() => {
        running = false;
      });
  }, intervalMs);
  timer.unref();

  return {
    stop: () => clearInterval(timer),
  };
}
