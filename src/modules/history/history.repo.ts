import { withTransaction, type Database, type Queryable } from "../../db";
import { generateHistoryId } from "../../utils/ids";
import { priorityRank, REVIEW_PRIORITIES } from "../pipeline/routing";
import {
  HISTORY_STATUSES,
  type HistoryFilters,
  type HistoryPage,
  type HistoryRecord,
  type HistoryRecordRow,
  type HistoryRepository,
  type HistoryStatistics,
  type NewHistoryRecord,
} from "./history.types";

const HISTORY_COLUMNS = `history_id, document_id, status, format, size_bytes, routing_decision,
  routing_reason, final_confidence, confidence_threshold, priority, priority_rank,
  extracted_text, processing_time_ms, error_code, error_message, result, created_at, expires_at`;

type CountRow = { count: string | number };

function toNumber(value: string | number | null | undefined): number {
  return value === null || value === undefined ? 0 : Number(value);
}

function nullableNumber(value: number | string | null): number | null {
  return value === null ? null : Number(value);
}

export function mapHistoryRow(row: HistoryRecordRow): HistoryRecord {
  return {
    historyId: row.history_id,
    documentId: row.document_id,
    status: row.status,
    format: row.format,
    sizeBytes: nullableNumber(row.size_bytes),
    routingDecision: row.routing_decision,
    routingReason: row.routing_reason,
    finalConfidence: nullableNumber(row.final_confidence),
    confidenceThreshold: nullableNumber(row.confidence_threshold),
    priority: row.priority,
    extractedText: row.extracted_text,
    processingTimeMs: Number(row.processing_time_ms),
    errorCode: row.error_code,
    errorMessage: row.error_message,
    result: row.result,
    createdAt: new Date(row.created_at),
    expiresAt: new Date(row.expires_at),
  };
}

async function deleteExpiredRows(runner: Queryable, now: Date): Promise<number> {
  const res = await runner.query(
    "delete from processing_history where expires_at < $1::timestamptz",
    [now.toISOString()]
  );
  return res.rowCount ?? 0;
}

function buildWhere(filters: Pick<HistoryFilters, "status" | "priority">, now: Date): {
  clause: string;
  values: Array<string | number>;
} {
  const conditions = ["expires_at >= $1::timestamptz"];
  const values: Array<string | number> = [now.toISOString()];
  if (filters.status) {
    values.push(filters.status);
    conditions.push(`status = $${values.length}`);
  }
  if (filters.priority) {
    values.push(filters.priority);
    conditions.push(`priority = $${values.length}`);
  }
  return { clause: conditions.join(" and "), values };
}

export function createPgHistoryRepository(db: Database): HistoryRepository {
  return {
    async insert(record: NewHistoryRecord, now: Date): Promise<HistoryRecord> {
      return withTransaction(db, async (client) => {
        await deleteExpiredRows(client, now);
        const res = await client.query<HistoryRecordRow>(
          `insert into processing_history (${HISTORY_COLUMNS})
           values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15,
                   $16::jsonb, $17::timestamptz, $18::timestamptz)
           returning ${HISTORY_COLUMNS}`,
          [
            generateHistoryId(),
            record.documentId,
            record.status,
            record.format,
            record.sizeBytes,
            record.routingDecision,
            record.routingReason,
            record.finalConfidence,
            record.confidenceThreshold,
            record.priority,
            record.priority ? priorityRank(record.priority) : null,
            record.extractedText,
            record.processingTimeMs,
            record.errorCode,
            record.errorMessage,
            record.result ? JSON.stringify(record.result) : null,
            record.createdAt.toISOString(),
            record.expiresAt.toISOString(),
          ]
        );
        const row = res.rows[0];
        if (!row) {
          throw new Error("history_insert_failed");
        }
        return mapHistoryRow(row);
      });
    },

    async findLatestByDocumentId(documentId: string, now: Date): Promise<HistoryRecord | null> {
      const res = await db.query<HistoryRecordRow>(
        `select ${HISTORY_COLUMNS}
         from processing_history
         where document_id = $1
           and expires_at >= $2::timestamptz
         order by created_at desc
         limit 1`,
        [documentId, now.toISOString()]
      );
      const row = res.rows[0];
      return row ? mapHistoryRow(row) : null;
    },

    async findById(historyId: string, now: Date): Promise<HistoryRecord | null> {
      const res = await db.query<HistoryRecordRow>(
        `select ${HISTORY_COLUMNS}
         from processing_history
         where history_id = $1
           and expires_at >= $2::timestamptz`,
        [historyId, now.toISOString()]
      );
      const row = res.rows[0];
      return row ? mapHistoryRow(row) : null;
    },

    async query(filters: HistoryFilters, now: Date): Promise<HistoryPage> {
      const { clause, values } = buildWhere(filters, now);
      const countRes = await db.query<CountRow>(
        `select count(*) as count from processing_history where ${clause}`,
        values
      );
      const orderBy =
        filters.order === "review_priority"
          ? "priority_rank asc, created_at asc"
          : "created_at desc";
      const pageValues = [...values, filters.limit, filters.offset];
      const res = await db.query<HistoryRecordRow>(
        `select ${HISTORY_COLUMNS}
         from processing_history
         where ${clause}
         order by ${orderBy}
         limit $${values.length + 1} offset $${values.length + 2}`,
        pageValues
      );
      return {
        records: res.rows.map(mapHistoryRow),
        total: toNumber(countRes.rows[0]?.count),
      };
    },

    async statistics(now: Date): Promise<HistoryStatistics> {
      const isoNow = now.toISOString();
      const byStatusRes = await db.query<{ status: string; count: string | number }>(
        `select status, count(*) as count
         from processing_history
         where expires_at >= $1::timestamptz
         group by status`,
        [isoNow]
      );
      const byPriorityRes = await db.query<{ priority: string; count: string | number }>(
        `select priority, count(*) as count
         from processing_history
         where expires_at >= $1::timestamptz
           and priority is not null
         group by priority`,
        [isoNow]
      );
      const rangeRes = await db.query<{ oldest: Date | null; newest: Date | null }>(
        `select min(created_at) as oldest, max(created_at) as newest
         from processing_history
         where expires_at >= $1::timestamptz`,
        [isoNow]
      );

      const stats: HistoryStatistics = {
        total: 0,
        byStatus: { pass: 0, requires_review: 0, failed: 0 },
        byPriority: { high: 0, medium: 0, low: 0 },
        oldestRecordAt: null,
        newestRecordAt: null,
      };
      for (const row of byStatusRes.rows) {
        const status = HISTORY_STATUSES.find((candidate) => candidate === row.status);
        if (status) {
          stats.byStatus[status] = toNumber(row.count);
          stats.total += toNumber(row.count);
        }
      }
      for (const row of byPriorityRes.rows) {
        const priority = REVIEW_PRIORITIES.find((candidate) => candidate === row.priority);
        if (priority) {
          stats.byPriority[priority] = toNumber(row.count);
        }
      }
      const range = rangeRes.rows[0];
      stats.oldestRecordAt = range?.oldest ? new Date(range.oldest) : null;
      stats.newestRecordAt = range?.newest ? new Date(range.newest) : null;
      return stats;
    },

    async deleteExpired(now: Date): Promise<number> {
      return deleteExpiredRows(db, now);
    },
  };
}
