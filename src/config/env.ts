import dotenv from "dotenv";

dotenv.config();

export type NumberRule = {
  min?: number;
  max?: number;
  /** Rejects `min` itself. */
  exclusiveMin?: boolean;
  integer?: boolean;
};

export function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

export function requireEnv(key: string): string {
  const value = readEnv(key);
  if (!value) {
    throw new Error(`${key} is not defined`);
  }
  return value;
}

/** Reads a numeric setting; anything unparsable or out of range yields the fallback. */
export function readNumber(key: string, fallback: number, rule: NumberRule = {}): number {
  const raw = readEnv(key);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  const value = rule.integer ? Math.floor(parsed) : parsed;
  if (rule.min !== undefined && (rule.exclusiveMin ? value <= rule.min : value < rule.min)) {
    return fallback;
  }
  if (rule.max !== undefined && value > rule.max) {
    return fallback;
  }
  return value;
}

export const positiveInt: NumberRule = { min: 0, exclusiveMin: true, integer: true };
export const nonNegativeInt: NumberRule = { min: 0, integer: true };
export const percentage: NumberRule = { min: 0, max: 100 };
export const ratio: NumberRule = { min: 0, max: 1 };

export function readList(key: string, fallback: string[]): string[] {
  const entries = (readEnv(key) ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return entries.length > 0 ? entries : fallback;
}
