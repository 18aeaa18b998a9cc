import { AppError, notFoundError, toErrorEnvelope } from "../../middleware/errors";
import { describeError, logError, logInfo, logWarn } from "../../observability/logger";
import { systemClock, type Clock } from "../../utils/clock";
import { generateDocumentId, generateJobId } from "../../utils/ids";
import { processWithDeadline, type PipelineController } from "../pipeline/pipeline.service";
import type { DocumentSubmission } from "../pipeline/pipeline.types";
import { projectResult } from "../pipeline/response.builder";
import {
  isTerminalJobStatus,
  type AcceptedJob,
  type BatchStatus,
  type BatchStatusPayload,
  type JobRecord,
  type JobRepository,
  type JobStatusPayload,
} from "./jobs.types";

export type JobManagerOptions = {
  repository: JobRepository;
  pipeline: Pick<PipelineController, "process">;
  concurrency: number;
  queueCapacity: number;
  timeoutMs: number;
  clock?: Clock;
};

type QueuedJob = AcceptedJob & {
  submission: DocumentSubmission;
};

export type JobManagerStats = {
  active: number;
  queued: number;
  concurrency: number;
  queueCapacity: number;
};

export function toJobStatusPayload(job: JobRecord): JobStatusPayload {
  const payload: JobStatusPayload = {
    job_id: job.id,
    status: job.status,
    progress_percentage: Number(job.progress),
  };
  if (job.status === "completed" && job.result) {
    payload.result = job.result;
  }
  if (job.status === "failed") {
    payload.error = {
      error_code: job.error_code ?? "INTERNAL",
      message: job.error_message ?? "Unexpected error",
    };
  }
  return payload;
}

function summarizeBatch(jobs: readonly JobRecord[]): BatchStatus {
  const failed = jobs.filter((job) => job.status === "failed").length;
  if (jobs.some((job) => !isTerminalJobStatus(job.status))) {
    return "processing";
  }
  if (failed === jobs.length) {
    return "failed";
  }
  return failed > 0 ? "partially_failed" : "completed";
}

/**
 * Runs submissions on a bounded in-process worker pool. Up to `concurrency`
 * pipelines run at once and up to `queueCapacity` more wait; beyond that a
 * submission is rejected with `OVERLOADED`.
 */
export class JobManager {
  private readonly repository: JobRepository;
  private readonly pipeline: Pick<PipelineController, "process">;
  private readonly concurrency: number;
  private readonly queueCapacity: number;
  private readonly timeoutMs: number;
  private readonly clock: Clock;

  private readonly queue: QueuedJob[] = [];
  private active = 0;
  private reserved = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: JobManagerOptions) {
    this.repository = options.repository;
    this.pipeline = options.pipeline;
    this.concurrency = Math.max(1, options.concurrency);
    this.queueCapacity = Math.max(0, options.queueCapacity);
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? systemClock;
  }

  stats(): JobManagerStats {
    return {
      active: this.active,
      queued: this.queue.length + this.reserved,
      concurrency: this.concurrency,
      queueCapacity: this.queueCapacity,
    };
  }

  async submit(submission: DocumentSubmission): Promise<AcceptedJob> {
    const [accepted] = await this.submitMany([submission]);
    if (!accepted) {
      throw new AppError("INTERNAL", "Job was not accepted.", 500);
    }
    return accepted;
  }

  /**
   * Accepts every submission or, when capacity is short, none of them. With a
   * `batchId` the jobs are stored under it in submission order.
   */
  async submitMany(
    submissions: readonly DocumentSubmission[],
    batchId?: string
  ): Promise<AcceptedJob[]> {
    const free = this.concurrency + this.queueCapacity - this.active - this.queue.length - this.reserved;
    if (submissions.length > free) {
      logWarn("job_rejected_overloaded", { requested: submissions.length, free });
      throw new AppError("OVERLOADED", "Processing queue is full; retry later.", 503, {
        queue_capacity: this.queueCapacity,
      });
    }

    let remaining = submissions.length;
    this.reserved += remaining;
    const accepted: AcceptedJob[] = [];
    try {
      for (const [index, submission] of submissions.entries()) {
        const job: QueuedJob = {
          jobId: generateJobId(),
          documentId: generateDocumentId(),
          submission,
        };
        await this.repository.create(
          {
            id: job.jobId,
            documentId: job.documentId,
            returnFormat: submission.options.returnFormat,
            batchId,
            batchIndex: batchId === undefined ? undefined : index,
          },
          this.clock.now()
        );
        this.reserved -= 1;
        remaining -= 1;
        this.queue.push(job);
        accepted.push({ jobId: job.jobId, documentId: job.documentId });
        logInfo("job_accepted", { jobId: job.jobId, documentId: job.documentId, batchId });
        this.pump();
      }
    } finally {
      this.reserved -= remaining;
    }
    return accepted;
  }

  async status(jobId: string): Promise<JobStatusPayload> {
    const job = await this.repository.findById(jobId);
    if (!job) {
      throw notFoundError(`Job ${jobId} not found.`);
    }
    return toJobStatusPayload(job);
  }

  async batchStatus(batchId: string): Promise<BatchStatusPayload> {
    const jobs = await this.repository.findByBatchId(batchId);
    if (jobs.length === 0) {
      throw notFoundError(`Batch ${batchId} not found.`);
    }
    return {
      batch_id: batchId,
      status: summarizeBatch(jobs),
      total_documents: jobs.length,
      completed_documents: jobs.filter((job) => job.status === "completed").length,
      failed_documents: jobs.filter((job) => job.status === "failed").length,
      jobs: jobs.map(toJobStatusPayload),
    };
  }

  /**
   * Drops a queued job before it starts, or deletes a finished one. A job that
   * is already processing cannot be removed.
   */
  async remove(jobId: string): Promise<void> {
    const job = await this.repository.findById(jobId);
    if (!job) {
      throw notFoundError(`Job ${jobId} not found.`);
    }

    const queuedAt = this.queue.findIndex((queued) => queued.jobId === jobId);
    if (queuedAt >= 0) {
      this.queue.splice(queuedAt, 1);
      this.notifyIfIdle();
    }

    if (await this.repository.remove(jobId)) {
      logInfo("job_removed", { jobId, status: job.status, dequeued: queuedAt >= 0 });
      return;
    }
    const current = await this.repository.findById(jobId);
    if (!current) {
      throw notFoundError(`Job ${jobId} not found.`);
    }
    throw new AppError("CONFLICT", `Job ${jobId} is processing and cannot be removed.`, 409, {
      status: current.status,
    });
  }

  /** Resolves once no job is running or queued. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0 && this.reserved === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const job = this.queue.shift();
      if (!job) {
        break;
      }
      this.active += 1;
      this.execute(job)
        .catch((err: unknown) => {
          logError("job_execution_crashed", {
            jobId: job.jobId,
            error: describeError(err),
          });
        })
        .finally(() => {
          this.active -= 1;
          this.pump();
          this.notifyIfIdle();
        });
    }
  }

  private async execute(job: QueuedJob): Promise<void> {
    const started = await this.repository.markProcessing(job.jobId, this.clock.now());
    if (!started) {
      logWarn("job_not_startable", { jobId: job.jobId });
      return;
    }
    logInfo("job_processing", { jobId: job.jobId, documentId: job.documentId });

    try {
      const result = await processWithDeadline(this.pipeline, job.submission, {
        documentId: job.documentId,
        timeoutMs: this.timeoutMs,
        onStage: (_stage, progress) => {
          this.repository
            .updateProgress(job.jobId, progress, this.clock.now())
            .catch((err: unknown) => {
              logWarn("job_progress_update_failed", {
                jobId: job.jobId,
                error: describeError(err),
              });
            });
        },
      });
      const completed = await this.repository.markCompleted(
        job.jobId,
        projectResult(result, job.submission.options.returnFormat),
        this.clock.now()
      );
      logInfo("job_completed", { jobId: job.jobId, applied: completed !== null });
    } catch (err) {
      const envelope = toErrorEnvelope(err);
      if (envelope.error_code === "INTERNAL") {
        logError("job_failed_unexpectedly", {
          jobId: job.jobId,
          error: describeError(err),
        });
      }
      await this.repository.markFailed(
        job.jobId,
        { code: envelope.error_code, message: envelope.message },
        this.clock.now()
      );
      logWarn("job_failed", { jobId: job.jobId, errorCode: envelope.error_code });
    }
  }
}
