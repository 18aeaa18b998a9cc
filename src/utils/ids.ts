import { randomUUID } from "crypto";

function shortId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function generateDocumentId(): string {
  return shortId("doc");
}

export function generateJobId(): string {
  return shortId("job");
}

export function generateBatchId(): string {
  return shortId("batch");
}

export function generateHistoryId(): string {
  return randomUUID();
}
