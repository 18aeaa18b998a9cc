import { AppError } from "../../middleware/errors";
import { describeError, logError, logInfo, logWarn } from "../../observability/logger";
import { elapsedMs, systemClock, type Clock } from "../../utils/clock";
import { generateDocumentId } from "../../utils/ids";
import { withTimeout, type DeadlineHandle } from "../../utils/withTimeout";
import type { HistoryRecorder } from "../history/history.types";
import type { PipelineCapabilities } from "../providers/providers.types";
import {
  computeFinalConfidence,
  DEFAULT_CONFIDENCE_WEIGHTS,
  type ConfidenceWeights,
} from "./confidence.scorer";
import { PipelineTimeoutError, RemoteServiceError } from "./pipeline.errors";
import {
  createInitialState,
  PIPELINE_STAGES,
  type PipelineStage,
  type PipelineState,
  type StageDependencies,
} from "./pipeline.stages";
import type {
  DocumentFormat,
  DocumentSubmission,
  ProcessingResult,
  StageRecord,
} from "./pipeline.types";
import { QualityGate } from "./quality.gate";
import { buildConfidenceReport } from "./routing";
import { SourceResolver } from "./source.resolver";

export type PipelineControllerOptions = {
  capabilities: PipelineCapabilities;
  history: HistoryRecorder;
  maxDocumentSizeBytes: number;
  supportedFormats?: readonly DocumentFormat[];
  confidenceWeights?: ConfidenceWeights;
  clock?: Clock;
  stages?: readonly PipelineStage[];
};

export type ProcessOptions = {
  documentId?: string;
  signal?: AbortSignal;
  onStage?: (stage: StageRecord, progress: number) => void;
  /**
   * Called right before the result is appended to history. Returning false
   * abandons the run; nothing is recorded.
   */
  claimCommit?: () => boolean;
};

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new AppError("INTERNAL", "Processing was cancelled.", 500);
}

/**
 * Runs the stage sequence for one submission, scores and routes the outcome,
 * and appends it to history. Remote failures of fatal stages are recorded as
 * failed history entries before being rethrown; nothing is recorded once the
 * signal has aborted.
 */
export class PipelineController {
  private readonly deps: StageDependencies;
  private readonly history: HistoryRecorder;
  private readonly weights: ConfidenceWeights;
  private readonly clock: Clock;
  private readonly stages: readonly PipelineStage[];

  constructor(options: PipelineControllerOptions) {
    this.deps = {
      capabilities: options.capabilities,
      resolver: new SourceResolver({
        storage: options.capabilities.storage,
        maxSizeBytes: options.maxDocumentSizeBytes,
        supportedFormats: options.supportedFormats,
      }),
      qualityGate: new QualityGate(options.capabilities.qualityAssessor),
    };
    this.history = options.history;
    this.weights = options.confidenceWeights ?? DEFAULT_CONFIDENCE_WEIGHTS;
    this.clock = options.clock ?? systemClock;
    this.stages = options.stages ?? PIPELINE_STAGES;
  }

  async process(submission: DocumentSubmission, options: ProcessOptions = {}): Promise<ProcessingResult> {
    const documentId = options.documentId ?? generateDocumentId();
    const startedAt = this.clock.now();
    const state = createInitialState(submission);
    const ledger: StageRecord[] = [];

    for (const stage of this.stages) {
      if (options.signal?.aborted) {
        throw abortError(options.signal);
      }
      const record = await this.runStage(stage, state, documentId, startedAt, options);
      ledger.push(record);
      options.onStage?.(record, stage.progress);
    }

    if (!state.source || !state.quality) {
      throw new AppError("INTERNAL", "Pipeline finished without a quality assessment.", 500);
    }

    const ocrConfidenceScore = state.ocr ? state.ocr.confidenceScore : null;
    const finalConfidence = computeFinalConfidence(
      state.quality.score,
      ocrConfidenceScore,
      this.weights
    );
    const confidence = buildConfidenceReport({
      qualityScore: state.quality.score,
      qualityPassed: state.quality.passed,
      ocrConfidenceScore,
      ocrAttempted: state.ocr !== null,
      finalConfidence,
      thresholds: submission.thresholds,
    });

    const result: ProcessingResult = {
      documentId,
      createdAt: startedAt,
      format: state.source.format,
      sizeBytes: state.source.sizeBytes,
      thresholds: { ...submission.thresholds },
      options: { ...submission.options },
      quality: state.quality,
      initialQuality: state.initialQuality,
      preprocessingApplied: state.preprocessingApplied,
      ocr: state.ocr,
      enhancement: state.enhancement,
      confidence,
      stages: ledger,
      warnings: state.warnings,
      totalTimeMs: elapsedMs(this.clock, startedAt),
    };

    if (options.signal?.aborted) {
      throw abortError(options.signal);
    }
    if (options.claimCommit && !options.claimCommit()) {
      throw options.signal
        ? abortError(options.signal)
        : new AppError("INTERNAL", "Processing was cancelled.", 500);
    }
    await this.history.recordResult(result);

    logInfo("pipeline_completed", {
      documentId,
      routingDecision: confidence.routingDecision,
      finalConfidence,
      durationMs: result.totalTimeMs,
    });
    return result;
  }

  private async runStage(
    stage: PipelineStage,
    state: PipelineState,
    documentId: string,
    pipelineStartedAt: Date,
    options: ProcessOptions
  ): Promise<StageRecord> {
    const decision = stage.decide(state);
    if (!decision.run) {
      logInfo("pipeline_stage_skipped", { documentId, stage: stage.name, reason: decision.reason });
      return { name: stage.name, status: "skipped", reason: decision.reason, durationMs: 0 };
    }

    const stageStartedAt = this.clock.now();
    try {
      await stage.run(state, this.deps, { signal: options.signal });
    } catch (err) {
      const durationMs = elapsedMs(this.clock, stageStartedAt);
      const message = describeError(err);
      if (!stage.fatal && !options.signal?.aborted) {
        state.warnings.push(`${stage.name} failed: ${message}`);
        logWarn("pipeline_stage_degraded", { documentId, stage: stage.name, error: message, durationMs });
        return { name: stage.name, status: "failed", reason: message, durationMs };
      }
      logWarn("pipeline_stage_failed", { documentId, stage: stage.name, error: message, durationMs });
      if (err instanceof RemoteServiceError && !options.signal?.aborted) {
        await this.history
          .recordFailure({
            documentId,
            format: state.source?.format ?? null,
            sizeBytes: state.source?.sizeBytes ?? null,
            confidenceThreshold: state.submission.thresholds.confidenceThreshold,
            errorCode: err.code,
            errorMessage: err.message,
            processingTimeMs: elapsedMs(this.clock, pipelineStartedAt),
          })
          .catch((historyErr: unknown) => {
            logError("history_failure_not_recorded", {
              documentId,
              stage: stage.name,
              error: describeError(historyErr),
            });
          });
      }
      throw err;
    }

    const durationMs = elapsedMs(this.clock, stageStartedAt);
    logInfo("pipeline_stage_completed", { documentId, stage: stage.name, durationMs });
    return { name: stage.name, status: "completed", durationMs };
  }
}

export type DeadlineOptions = Omit<ProcessOptions, "signal" | "claimCommit"> & {
  timeoutMs: number;
};

/**
 * Runs the pipeline under a total deadline. On expiry the in-flight remote
 * call is aborted, `TIMEOUT` is thrown and any late outcome is only logged.
 * Appending to history is the commit point: the deadline is stopped just
 * before it, so a recorded result is never reported as timed out.
 */
export function processWithDeadline(
  controller: Pick<PipelineController, "process">,
  submission: DocumentSubmission,
  options: DeadlineOptions
): Promise<ProcessingResult> {
  const abort = new AbortController();
  const { timeoutMs, ...processOptions } = options;
  let deadline: DeadlineHandle | null = null;
  return withTimeout(
    controller.process(submission, {
      ...processOptions,
      signal: abort.signal,
      claimCommit: () => (deadline ? deadline.stop() : !abort.signal.aborted),
    }),
    timeoutMs,
    {
      controller: abort,
      onStart: (handle) => {
        deadline = handle;
      },
      onTimeout: () => new PipelineTimeoutError(timeoutMs),
      onLate: (outcome) => {
        logWarn("pipeline_late_outcome_discarded", {
          documentId: options.documentId,
          error:
            outcome.error instanceof Error ? outcome.error.message : outcome.error ? "unknown_error" : null,
        });
      },
    }
  );
}
