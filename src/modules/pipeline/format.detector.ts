import type { DocumentFormat } from "./pipeline.types";

type Signature = {
  format: DocumentFormat;
  matches: (bytes: Buffer) => boolean;
};

function startsWith(bytes: Buffer, prefix: number[], offset = 0): boolean {
  if (bytes.length < offset + prefix.length) {
    return false;
  }
  return prefix.every((value, index) => bytes[offset + index] === value);
}

function startsWithAscii(bytes: Buffer, text: string, offset = 0): boolean {
  return startsWith(bytes, [...Buffer.from(text, "ascii")], offset);
}

const SIGNATURES: Signature[] = [
  { format: "png", matches: (b) => startsWith(b, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]) },
  { format: "jpg", matches: (b) => startsWith(b, [0xff, 0xd8, 0xff]) },
  { format: "gif", matches: (b) => startsWithAscii(b, "GIF87a") || startsWithAscii(b, "GIF89a") },
  {
    format: "tiff",
    matches: (b) => startsWith(b, [0x49, 0x49, 0x2a, 0x00]) || startsWith(b, [0x4d, 0x4d, 0x00, 0x2a]),
  },
  { format: "webp", matches: (b) => startsWithAscii(b, "RIFF") && startsWithAscii(b, "WEBP", 8) },
  { format: "pdf", matches: (b) => startsWithAscii(b, "%PDF-") },
  { format: "psd", matches: (b) => startsWithAscii(b, "8BPS") },
  { format: "bmp", matches: (b) => startsWithAscii(b, "BM") },
  { format: "ico", matches: (b) => startsWith(b, [0x00, 0x00, 0x01, 0x00]) },
  // ZSoft manufacturer byte, version 0-5, RLE encoding 0 or 1
  {
    format: "pcx",
    matches: (b) => b.length >= 3 && b[0] === 0x0a && (b[1] ?? 0xff) <= 5 && (b[2] ?? 0xff) <= 1,
  },
];

/** Identifies a document by its leading bytes. Returns null when nothing matches. */
export function detectDocumentFormat(bytes: Buffer): DocumentFormat | null {
  const signature = SIGNATURES.find((candidate) => candidate.matches(bytes));
  return signature ? signature.format : null;
}
