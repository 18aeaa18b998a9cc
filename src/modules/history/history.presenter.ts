import type { FullResponse } from "../pipeline/response.builder";
import type { ReviewPriority } from "../pipeline/routing";
import type { HistoryRecord, HistoryStatistics, HistoryStatus } from "./history.types";

export type HistoryRecordResponse = {
  history_id: string;
  document_id: string;
  status: HistoryStatus;
  format: string | null;
  size_bytes: number | null;
  routing_decision: string | null;
  routing_reason: string | null;
  final_confidence: number | null;
  confidence_threshold: number | null;
  priority: ReviewPriority | null;
  extracted_text: string | null;
  processing_time_ms: number;
  error_code: string | null;
  error_message: string | null;
  result: FullResponse | null;
  processed_at: string;
  expires_at: string;
};

export function toHistoryResponse(record: HistoryRecord): HistoryRecordResponse {
  return {
    history_id: record.historyId,
    document_id: record.documentId,
    status: record.status,
    format: record.format,
    size_bytes: record.sizeBytes,
    routing_decision: record.routingDecision,
    routing_reason: record.routingReason,
    final_confidence: record.finalConfidence,
    confidence_threshold: record.confidenceThreshold,
    priority: record.priority,
    extracted_text: record.extractedText,
    processing_time_ms: record.processingTimeMs,
    error_code: record.errorCode,
    error_message: record.errorMessage,
    result: record.result,
    processed_at: record.createdAt.toISOString(),
    expires_at: record.expiresAt.toISOString(),
  };
}

export function toStatisticsResponse(stats: HistoryStatistics, retentionMs: number) {
  return {
    total_records: stats.total,
    by_status: stats.byStatus,
    by_priority: stats.byPriority,
    oldest_record_at: stats.oldestRecordAt ? stats.oldestRecordAt.toISOString() : null,
    newest_record_at: stats.newestRecordAt ? stats.newestRecordAt.toISOString() : null,
    retention_days: retentionMs / (24 * 60 * 60 * 1000),
  };
}
