/**
 * record-validators.ts — RawRecord → table row transforms.
 *
 * Pure functions. A record that cannot be keyed throws ValidationError;
 * every other field degrades to its default (0 for counts, null for
 * analytic fields). Nothing is logged here; the processor tallies failures.
 */

import { ValidationError } from "../errors.js";
import type { CountStatsRow, DataDate, SubjectStatsRow } from "../types.js";

type RawObject = Record<string, unknown>;

const DIGITS = /^\d+$/;
const DECIMAL = /^-?\d+(\.\d+)?$/;

/** Upper bound of a Postgres INTEGER column. */
const INT4_MAX = 2_147_483_647;

/** Plausible bounds for a rating average. */
export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

function isRawObject(raw: unknown): raw is RawObject {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function asObject(raw: unknown): RawObject {
  if (!isRawObject(raw)) {
    throw new ValidationError("record", "expected a JSON object");
  }
  return raw;
}

/** Numbers pass through; numeric strings are parsed; everything else is NaN. */
function toNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && DECIMAL.test(value.trim())) return Number(value.trim());
  return Number.NaN;
}

function requireId(record: RawObject): number {
  const raw = record.id;
  if (raw === undefined || raw === null) {
    throw new ValidationError("id", "missing");
  }
  const id = typeof raw === "string" && DIGITS.test(raw.trim()) ? Number(raw.trim()) : raw;
  if (typeof id !== "number" || !Number.isSafeInteger(id) || id < 0 || id > INT4_MAX) {
    throw new ValidationError("id", `not a non-negative integer: ${JSON.stringify(raw)}`);
  }
  return id;
}

/** Count fields are advisory: anything unusable becomes 0. */
export function coerceCount(value: unknown): number {
  const n = toNumber(value);
  if (!Number.isFinite(n) || n <= 0) return 0;
  return Math.min(Math.trunc(n), INT4_MAX);
}

export function coerceScore(value: unknown): number | null {
  if (value === undefined || value === null) return null;
  const n = toNumber(value);
  if (!Number.isFinite(n) || n < MIN_SCORE || n > MAX_SCORE) return null;
  return Math.round((n + Number.EPSILON) * 10) / 10;
}

export function coerceRank(value: unknown): number | null {
  if (value === undefined || value === null) return null;
  const n = toNumber(value);
  if (!Number.isSafeInteger(n) || n < 1 || n > INT4_MAX) return null;
  return n;
}

function containsNul(value: unknown): boolean {
  if (typeof value === "string") return value.includes("\u0000");
  if (Array.isArray(value)) return value.some(containsNul);
  if (isRawObject(value)) {
    return Object.entries(value).some(([key, nested]) => key.includes("\u0000") || containsNul(nested));
  }
  return false;
}

/**
 * Schema-free jsonb columns: serialize whatever structure is present.
 * jsonb cannot store U+0000, so such a value fails the record instead of its batch.
 */
function toJsonColumn(field: string, value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (containsNul(value)) {
    throw new ValidationError(field, "contains a NUL character");
  }
  return JSON.stringify(value);
}

export function toCountStatsRow(raw: unknown, dataDate: DataDate): CountStatsRow {
  const record = asObject(raw);
  return {
    id: requireId(record),
    comments: coerceCount(record.comments),
    collects: coerceCount(record.collects),
    data_date: dataDate,
  };
}

export function toSubjectStatsRow(raw: unknown, dataDate: DataDate): SubjectStatsRow {
  const record = asObject(raw);
  return {
    id: requireId(record),
    score: coerceScore(record.score),
    score_details: toJsonColumn("score_details", record.score_details),
    rank: coerceRank(record.rank),
    favorite: toJsonColumn("favorite", record.favorite),
    data_date: dataDate,
  };
}
