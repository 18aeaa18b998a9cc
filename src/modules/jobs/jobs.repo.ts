import type { Database } from "../../db";
import type { ProcessingResponse } from "../pipeline/response.builder";
import {
  sourceStatesFor,
  type JobError,
  type JobRecord,
  type JobRepository,
  type NewJob,
} from "./jobs.types";

const JOB_COLUMNS = `id, document_id, batch_id, batch_index, status, progress, return_format, result, error_code,
  error_message, created_at, updated_at, started_at, completed_at`;

function inList(states: readonly string[]): string {
  return states.map((state) => `'${state}'`).join(", ");
}

const PROCESSING_FROM = inList(sourceStatesFor("processing"));
const COMPLETED_FROM = inList(sourceStatesFor("completed"));
const FAILED_FROM = inList(sourceStatesFor("failed"));
const REMOVABLE = inList(["pending", "completed", "failed"]);

export function createPgJobRepository(db: Database): JobRepository {
  async function single(sql: string, values: unknown[]): Promise<JobRecord | null> {
    const res = await db.query<JobRecord>(sql, values);
    return res.rows[0] ?? null;
  }

  return {
    async create(job: NewJob, now: Date): Promise<JobRecord> {
      const record = await single(
        `insert into processing_jobs
         (id, document_id, batch_id, batch_index, status, progress, return_format,
          created_at, updated_at)
         values ($1, $2, $3, $4, 'pending', 0, $5, $6::timestamptz, $6::timestamptz)
         returning ${JOB_COLUMNS}`,
        [
          job.id,
          job.documentId,
          job.batchId ?? null,
          job.batchIndex ?? null,
          job.returnFormat,
          now.toISOString(),
        ]
      );
      if (!record) {
        throw new Error("job_insert_failed");
      }
      return record;
    },

    findById(id: string): Promise<JobRecord | null> {
      return single(`select ${JOB_COLUMNS} from processing_jobs where id = $1`, [id]);
    },

    async findByBatchId(batchId: string): Promise<JobRecord[]> {
      const res = await db.query<JobRecord>(
        `select ${JOB_COLUMNS}
         from processing_jobs
         where batch_id = $1
         order by batch_index asc`,
        [batchId]
      );
      return res.rows;
    },

    markProcessing(id: string, now: Date): Promise<JobRecord | null> {
      return single(
        `update processing_jobs
         set status = 'processing',
             started_at = $2::timestamptz,
             updated_at = $2::timestamptz
         where id = $1
           and status in (${PROCESSING_FROM})
         returning ${JOB_COLUMNS}`,
        [id, now.toISOString()]
      );
    },

    updateProgress(id: string, progress: number, now: Date): Promise<JobRecord | null> {
      return single(
        `update processing_jobs
         set progress = $2,
             updated_at = $3::timestamptz
         where id = $1
           and status = 'processing'
           and progress < $2
         returning ${JOB_COLUMNS}`,
        [id, progress, now.toISOString()]
      );
    },

    markCompleted(id: string, result: ProcessingResponse, now: Date): Promise<JobRecord | null> {
      return single(
        `update processing_jobs
         set status = 'completed',
             progress = 100,
             result = $2::jsonb,
             completed_at = $3::timestamptz,
             updated_at = $3::timestamptz
         where id = $1
           and status in (${COMPLETED_FROM})
         returning ${JOB_COLUMNS}`,
        [id, JSON.stringify(result), now.toISOString()]
      );
    },

    markFailed(id: string, error: JobError, now: Date): Promise<JobRecord | null> {
      return single(
        `update processing_jobs
         set status = 'failed',
             error_code = $2,
             error_message = $3,
             completed_at = $4::timestamptz,
             updated_at = $4::timestamptz
         where id = $1
           and status in (${FAILED_FROM})
         returning ${JOB_COLUMNS}`,
        [id, error.code, error.message, now.toISOString()]
      );
    },

    async remove(id: string): Promise<boolean> {
      const res = await db.query<{ id: string }>(
        `delete from processing_jobs
         where id = $1
           and status in (${REMOVABLE})
         returning id`,
        [id]
      );
      return res.rows.length > 0;
    },
  };
}
