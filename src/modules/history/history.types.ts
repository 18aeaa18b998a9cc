import type { DocumentFormat, ProcessingResult, RoutingDecision } from "../pipeline/pipeline.types";
import type { ReviewPriority } from "../pipeline/routing";
import type { FullResponse } from "../pipeline/response.builder";

export type HistoryStatus = "pass" | "requires_review" | "failed";

export const HISTORY_STATUSES: readonly HistoryStatus[] = ["pass", "requires_review", "failed"];

export type HistoryRecordRow = {
  history_id: string;
  document_id: string;
  status: HistoryStatus;
  format: DocumentFormat | null;
  size_bytes: number | null;
  routing_decision: RoutingDecision | null;
  routing_reason: string | null;
  final_confidence: number | null;
  confidence_threshold: number | null;
  priority: ReviewPriority | null;
  priority_rank: number | null;
  extracted_text: string | null;
  processing_time_ms: number;
  error_code: string | null;
  error_message: string | null;
  result: FullResponse | null;
  created_at: Date;
  expires_at: Date;
};

export type HistoryRecord = {
  historyId: string;
  documentId: string;
  status: HistoryStatus;
  format: DocumentFormat | null;
  sizeBytes: number | null;
  routingDecision: RoutingDecision | null;
  routingReason: string | null;
  finalConfidence: number | null;
  confidenceThreshold: number | null;
  priority: ReviewPriority | null;
  extractedText: string | null;
  processingTimeMs: number;
  errorCode: string | null;
  errorMessage: string | null;
  result: FullResponse | null;
  createdAt: Date;
  expiresAt: Date;
};

export type NewHistoryRecord = Omit<HistoryRecord, "historyId">;

export type FailedProcessing = {
  documentId: string;
  format: DocumentFormat | null;
  sizeBytes: number | null;
  confidenceThreshold: number;
  errorCode: string;
  errorMessage: string;
  processingTimeMs: number;
};

export type HistoryOrder = "recent" | "review_priority";

export type HistoryFilters = {
  status?: HistoryStatus;
  priority?: ReviewPriority;
  limit: number;
  offset: number;
  /** `review_priority` sorts high before low, then oldest first. */
  order?: HistoryOrder;
};

export type HistoryPage = {
  records: HistoryRecord[];
  total: number;
};

export type HistoryStatistics = {
  total: number;
  byStatus: Record<HistoryStatus, number>;
  byPriority: Record<ReviewPriority, number>;
  oldestRecordAt: Date | null;
  newestRecordAt: Date | null;
};

export type HistoryRepository = {
  /** Removes expired rows and inserts the record in one transaction. */
  insert: (record: NewHistoryRecord, now: Date) => Promise<HistoryRecord>;
  findLatestByDocumentId: (documentId: string, now: Date) => Promise<HistoryRecord | null>;
  findById: (historyId: string, now: Date) => Promise<HistoryRecord | null>;
  query: (filters: HistoryFilters, now: Date) => Promise<HistoryPage>;
  statistics: (now: Date) => Promise<HistoryStatistics>;
  deleteExpired: (now: Date) => Promise<number>;
};

/** The write side the pipeline needs. */
export type HistoryRecorder = {
  recordResult: (result: ProcessingResult) => Promise<HistoryRecord>;
  recordFailure: (failure: FailedProcessing) => Promise<HistoryRecord>;
};
