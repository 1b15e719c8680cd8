/**
 * types.ts — Shared domain types.
 */

export const RECORD_TYPES = ["character", "person", "subject"] as const;

export type RecordType = (typeof RECORD_TYPES)[number];

export type StatsTableName = `${RecordType}_stats`;

/** YYYY-MM-DD, the snapshot a row belongs to. */
export type DataDate = string;

/** Row shape shared by character_stats and person_stats. */
export interface CountStatsRow {
  id: number;
  comments: number;
  collects: number;
  data_date: DataDate;
}

export interface SubjectStatsRow {
  id: number;
  score: number | null;
  /** Serialized JSON for the jsonb column */
  score_details: string | null;
  rank: number | null;
  /** Serialized JSON for the jsonb column */
  favorite: string | null;
  data_date: DataDate;
}

export type StatsRow = CountStatsRow | SubjectStatsRow;

export type RowFor<T extends RecordType> = T extends "subject" ? SubjectStatsRow : CountStatsRow;

/** Per-file counters for one processor invocation. Never persisted. */
export interface ProcessingStats {
  recordType: RecordType;
  path: string;
  dataDate: DataDate;
  totalRead: number;
  inserted: number;
  updated: number;
  skipped: number;
  failed: number;
  batches: number;
  failedBatches: number;
  durationMs: number;
}
