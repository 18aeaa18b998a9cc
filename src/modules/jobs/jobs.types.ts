import type { ErrorCode } from "../../middleware/errors";
import type { ReturnFormat } from "../pipeline/pipeline.types";
import type { ProcessingResponse } from "../pipeline/response.builder";

export type JobStatus = "pending" | "processing" | "completed" | "failed";

const ALLOWED_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["processing", "failed"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

/** States a job may be in when moving to `to`; used to guard SQL updates. */
export function sourceStatesFor(to: JobStatus): JobStatus[] {
  const states: JobStatus[] = ["pending", "processing", "completed", "failed"];
  return states.filter((from) => canTransition(from, to));
}

export type JobRecord = {
  id: string;
  document_id: string;
  batch_id: string | null;
  batch_index: number | null;
  status: JobStatus;
  progress: number;
  return_format: ReturnFormat;
  result: ProcessingResponse | null;
  error_code: ErrorCode | null;
  error_message: string | null;
  created_at: Date;
  updated_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
};

export type JobError = {
  code: ErrorCode;
  message: string;
};

export type NewJob = {
  id: string;
  documentId: string;
  returnFormat: ReturnFormat;
  batchId?: string;
  batchIndex?: number;
};

export type JobRepository = {
  create: (job: NewJob, now: Date) => Promise<JobRecord>;
  findById: (id: string) => Promise<JobRecord | null>;
  /** Jobs of a batch in submission order. */
  findByBatchId: (batchId: string) => Promise<JobRecord[]>;
  markProcessing: (id: string, now: Date) => Promise<JobRecord | null>;
  /** Progress only moves forward, and only while processing. */
  updateProgress: (id: string, progress: number, now: Date) => Promise<JobRecord | null>;
  markCompleted: (id: string, result: ProcessingResponse, now: Date) => Promise<JobRecord | null>;
  markFailed: (id: string, error: JobError, now: Date) => Promise<JobRecord | null>;
  /** Deletes a job that is not processing. Returns false when nothing was removed. */
  remove: (id: string) => Promise<boolean>;
};

export type JobStatusPayload = {
  job_id: string;
  status: JobStatus;
  progress_percentage: number;
  result?: ProcessingResponse;
  error?: {
    error_code: ErrorCode;
    message: string;
  };
};

export type AcceptedJob = {
  jobId: string;
  documentId: string;
};

export type BatchStatus = "processing" | "completed" | "partially_failed" | "failed";

export type BatchStatusPayload = {
  batch_id: string;
  status: BatchStatus;
  total_documents: number;
  completed_documents: number;
  failed_documents: number;
  jobs: JobStatusPayload[];
};
