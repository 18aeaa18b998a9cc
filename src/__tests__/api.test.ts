import request from "supertest";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildApp } from "../app";
import { createServices, type Services } from "../bootstrap";
import { RemoteServiceError } from "../modules/pipeline/pipeline.errors";
import { createFakeCapabilities } from "../test/helpers/fakeCapabilities";
import { FIXED_NOW, manualClock, PNG_BASE64, PNG_BYTES, TEXT_BASE64 } from "../test/helpers/fixtures";
import { createMemoryDatabase, type MemoryDatabase } from "../test/helpers/memoryDb";

const DOCUMENT_ID = /^doc_[0-9a-f]{12}$/;

describe("OCR API", () => {
  let memory: MemoryDatabase;
  let services: Services;
  let app: ReturnType<typeof buildApp>;
  let fakes: ReturnType<typeof createFakeCapabilities>;
  let clock: ReturnType<typeof manualClock>;

  beforeEach(async () => {
    memory = await createMemoryDatabase();
    fakes = createFakeCapabilities({
      objects: { "scans/invoice.png": PNG_BYTES },
    });
    const { capabilities } = fakes;
    clock = manualClock();
    services = createServices(memory.db, { capabilities, clock });
    app = buildApp(services);
  });

  afterEach(async () => {
    await services.jobs.onIdle();
    await memory.close();
  });

  function submit(body: object) {
    return request(app).post("/api/v1/ocr").send(body);
  }

  it("reports liveness", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "healthy", timestamp: "2026-03-02T10:00:00.000Z" });
  });

  it("processes an inline document synchronously", async () => {
    const res = await submit({ source: { type: "file", file: PNG_BASE64 } });

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("success");
    expect(res.body.confidence_report).toEqual({
      image_quality_score: 82.5,
      ocr_confidence_score: 94.5,
      final_confidence: 88.5,
      thresholds_applied: { image_quality_threshold: 60, confidence_threshold: 80 },
      routing_decision: "pass",
      routing_reason: "All thresholds met",
      quality_check_passed: true,
      confidence_check_passed: true,
    });
    expect(res.body.enhancement).toBeNull();
    expect(res.body.metadata.document_id).toMatch(DOCUMENT_ID);
    expect(res.body.metadata.timestamp).toBe("2026-03-02T10:00:00.000Z");
  });

  it("returns the minimal projection when asked", async () => {
    const res = await submit({
      source: { type: "file", file: PNG_BASE64 },
      processing_options: { return_format: "minimal" },
      thresholds: { confidence_threshold: 90 },
    });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "success",
      extracted_text: "Invoice total 42",
      routing_decision: "requires_review",
      confidence_score: 88.5,
      document_id: expect.stringMatching(DOCUMENT_ID),
    });
  });

  it("reads documents from object storage", async () => {
    const res = await submit({
      source: { type: "storage", url: "s3://scans/invoice.png" },
      processing_options: { return_format: "ocr_only" },
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      status: "success",
      raw_text: "Invoice total 42",
      word_count: 3,
      ocr_confidence: 94.5,
    });
  });

  it("rejects a missing storage object without recording history", async () => {
    const res = await submit({ source: { type: "storage", url: "obs://scans/missing.png" } });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error_code: "INVALID_SOURCE",
      message: "Storage object scans/missing.png is not available (status 404).",
      url: "obs://scans/missing.png",
      upstream_status: 404,
    });

    const stats = await request(app).get("/api/v1/ocr/history-stats");
    expect(stats.body.total_records).toBe(0);
  });

  it("records a failed history entry when storage is unreachable", async () => {
    fakes.getObject.mockRejectedValue(
      new RemoteServiceError({
        service: "storage",
        message: "storage fetch failed for scans/invoice.png: InternalError",
        retryable: true,
        upstreamStatus: 500,
      })
    );

    const res = await submit({ source: { type: "storage", url: "obs://scans/invoice.png" } });

    expect(res.status).toBe(502);
    expect(res.body).toMatchObject({
      error_code: "REMOTE_SERVICE_ERROR",
      message: "storage fetch failed for scans/invoice.png: InternalError",
      service: "storage",
    });

    const stats = await request(app).get("/api/v1/ocr/history-stats");
    expect(stats.body.by_status).toEqual({ pass: 0, requires_review: 0, failed: 1 });
  });

  it("accepts asynchronous submissions and exposes the job", async () => {
    const res = await submit({
      source: { type: "file", file: PNG_BASE64 },
      processing_options: { enable_enhancement: true },
      async_processing: true,
    });

    expect(res.status).toBe(202);
    expect(res.body).toEqual({
      status: "accepted",
      job_id: expect.stringMatching(/^job_[0-9a-f]{12}$/),
      message: "Document submitted for processing",
      estimated_time_seconds: 30,
    });

    await services.jobs.onIdle();
    const job = await request(app).get(`/api/v1/ocr/job/${res.body.job_id}`);
    expect(job.status).toBe(200);
    expect(job.body.status).toBe("completed");
    expect(job.body.progress_percentage).toBe(100);
    expect(job.body.result.enhancement).toMatchObject({
      performed: true,
      enhanced_text: "INVOICE TOTAL 42",
      tokens_used: 7,
    });
  });

  it("rejects job ids that cannot exist", async () => {
    const res = await request(app).get(`/api/v1/ocr/job/${"j".repeat(65)}`);

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe("INVALID_REQUEST");
    expect(res.body.message).toBe("Invalid request.");
  });

  it("returns 404 for an unknown job", async () => {
    const res = await request(app).get("/api/v1/ocr/job/job_unknown");

    expect(res.status).toBe(404);
    expect(res.body.error_code).toBe("NOT_FOUND");
    expect(res.body.message).toBe("Job job_unknown not found.");
  });

  it("rejects malformed requests with the caller's request id", async () => {
    const res = await submit({ source: { type: "ftp", url: "ftp://x" } }).set(
      "x-request-id",
      "req-123"
    );

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe("INVALID_REQUEST");
    expect(res.body.message).toBe("Invalid OCR request.");
    expect(res.body.request_id).toBe("req-123");
    expect(res.headers["x-request-id"]).toBe("req-123");
    expect(res.body.issues[0].path).toBe("source.type");
  });

  it("rejects bodies that are not JSON", async () => {
    const res = await request(app)
      .post("/api/v1/ocr")
      .set("Content-Type", "application/json")
      .send("{not json");

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Request body is not valid JSON.");
  });

  it("rejects payloads that are not base64", async () => {
    const res = await submit({ source: { type: "file", file: "not base64!!" } });

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe("INVALID_SOURCE");
    expect(res.body.message).toBe("Inline document payload is not valid base64.");
  });

  it("rejects malformed storage references before queueing", async () => {
    const res = await submit({
      source: { type: "storage", url: "https://example.test/a.png" },
      async_processing: true,
    });

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe("INVALID_SOURCE");
    expect(res.body.url).toBe("https://example.test/a.png");
  });

  it("rejects documents in an unknown format", async () => {
    const res = await submit({ source: { type: "file", file: TEXT_BASE64 } });

    expect(res.status).toBe(415);
    expect(res.body.error_code).toBe("FORMAT_NOT_SUPPORTED");
    expect(res.body.detected_format).toBeNull();
  });

  it("serves history for processed documents", async () => {
    const processed = await submit({ source: { type: "file", file: PNG_BASE64 } });
    const documentId = processed.body.metadata.document_id;

    const record = await request(app).get(`/api/v1/ocr/history/${documentId}`);
    expect(record.status).toBe(200);
    expect(record.body).toMatchObject({
      document_id: documentId,
      status: "pass",
      format: "png",
      size_bytes: 23,
      final_confidence: 88.5,
      extracted_text: "Invoice total 42",
      processed_at: "2026-03-02T10:00:00.000Z",
      expires_at: "2026-03-09T10:00:00.000Z",
    });

    const list = await request(app).get("/api/v1/ocr/history?status=pass&limit=5");
    expect(list.status).toBe(200);
    expect(list.body.total).toBe(1);
    expect(list.body.limit).toBe(5);
    expect(list.body.offset).toBe(0);
    expect(list.body.records[0].document_id).toBe(documentId);

    const stats = await request(app).get("/api/v1/ocr/history-stats");
    expect(stats.body).toEqual({
      total_records: 1,
      by_status: { pass: 1, requires_review: 0, failed: 0 },
      by_priority: { high: 0, medium: 0, low: 0 },
      oldest_record_at: "2026-03-02T10:00:00.000Z",
      newest_record_at: "2026-03-02T10:00:00.000Z",
      retention_days: 7,
    });
  });

  it("returns 404 when a document has no history", async () => {
    const res = await request(app).get("/api/v1/ocr/history/doc_missing");

    expect(res.status).toBe(404);
    expect(res.body.message).toBe("No history found for document doc_missing.");
  });

  it("validates history pagination", async () => {
    const res = await request(app).get("/api/v1/ocr/history?limit=500");

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe("INVALID_REQUEST");
    expect(res.body.issues[0].path).toBe("limit");
  });

  it("lists documents awaiting manual review", async () => {
    await submit({
      source: { type: "file", file: PNG_BASE64 },
      processing_options: { enable_ocr: false },
    });

    const res = await request(app).get("/api/v1/queue/manual-review?priority=low");

    expect(res.status).toBe(200);
    expect(res.body.total).toBe(1);
    expect(res.body.documents[0]).toMatchObject({
      status: "requires_review",
      priority: "low",
      routing_reason: "OCR was not performed",
    });
  });

  it("queues a batch of documents", async () => {
    const document = { source: { type: "file", file: PNG_BASE64 } };
    const res = await request(app)
      .post("/api/v1/ocr/batch")
      .send({ documents: [document, document] });

    expect(res.status).toBe(202);
    expect(res.body.status).toBe("accepted");
    expect(res.body.batch_id).toMatch(/^batch_[0-9a-f]{12}$/);
    expect(res.body.total_documents).toBe(2);
    expect(res.body.job_ids).toHaveLength(2);
  });

  it("tracks a stored batch until every job finishes", async () => {
    const res = await request(app)
      .post("/api/v1/ocr/batch")
      .send({
        documents: [
          { source: { type: "file", file: PNG_BASE64 } },
          { source: { type: "storage", url: "s3://scans/missing.png" } },
        ],
      });
    await services.jobs.onIdle();

    const batch = await request(app).get(`/api/v1/batch/${res.body.batch_id}`);
    expect(batch.status).toBe(200);
    expect(batch.body).toMatchObject({
      batch_id: res.body.batch_id,
      status: "partially_failed",
      total_documents: 2,
      completed_documents: 1,
      failed_documents: 1,
    });
    expect(batch.body.jobs.map((job: { job_id: string }) => job.job_id)).toEqual(res.body.job_ids);
  });

  it("returns 404 for an unknown batch", async () => {
    const res = await request(app).get("/api/v1/batch/batch_unknown");

    expect(res.status).toBe(404);
    expect(res.body.message).toBe("Batch batch_unknown not found.");
  });

  it("reports worker pool occupancy", async () => {
    const res = await request(app).get("/api/v1/batch/queue/status");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      queue_status: { active: 0, queued: 0, concurrency: 4, queue_capacity: 100 },
      max_batch_size: 20,
    });
  });

  it("reads a history record by its id", async () => {
    const processed = await submit({ source: { type: "file", file: PNG_BASE64 } });
    const documentId = processed.body.metadata.document_id;
    const latest = await request(app).get(`/api/v1/ocr/history/${documentId}`);

    const record = await request(app).get(`/api/v1/ocr/history/id/${latest.body.history_id}`);
    expect(record.status).toBe(200);
    expect(record.body).toEqual(latest.body);

    const missing = await request(app).get("/api/v1/ocr/history/id/hist_missing");
    expect(missing.status).toBe(404);
    expect(missing.body.message).toBe("History record hist_missing not found or expired.");
  });

  it("cleans up expired history on request", async () => {
    clock.set(new Date(FIXED_NOW.getTime() - 8 * 24 * 60 * 60 * 1000));
    await submit({ source: { type: "file", file: PNG_BASE64 } });
    clock.set(FIXED_NOW);

    const res = await request(app).post("/api/v1/ocr/history/cleanup");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "success",
      deleted_records: 1,
      message: "Cleaned up 1 expired records",
    });
    const again = await request(app).post("/api/v1/ocr/history/cleanup");
    expect(again.body.deleted_records).toBe(0);
  });

  it("deletes a finished job", async () => {
    const accepted = await submit({
      source: { type: "file", file: PNG_BASE64 },
      async_processing: true,
    });
    await services.jobs.onIdle();

    const res = await request(app).delete(`/api/v1/ocr/job/${accepted.body.job_id}`);
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "cancelled", job_id: accepted.body.job_id });

    const gone = await request(app).get(`/api/v1/ocr/job/${accepted.body.job_id}`);
    expect(gone.status).toBe(404);
    const again = await request(app).delete(`/api/v1/ocr/job/${accepted.body.job_id}`);
    expect(again.status).toBe(404);
  });

  it("points at the offending document in a batch", async () => {
    const res = await request(app)
      .post("/api/v1/ocr/batch")
      .send({
        documents: [
          { source: { type: "file", file: PNG_BASE64 } },
          { source: { type: "file", file: "===" } },
        ],
      });

    expect(res.status).toBe(400);
    expect(res.body.error_code).toBe("INVALID_SOURCE");
    expect(res.body.document_index).toBe(1);
  });

  it("answers unknown routes with the error envelope", async () => {
    const res = await request(app).get("/api/v1/nope");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error_code: "NOT_FOUND",
      message: "Route GET /api/v1/nope not found",
      request_id: expect.any(String),
    });
  });
});
