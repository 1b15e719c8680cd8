/**
 * stats-tables.ts — Destination table registry
 *
 * One entry per record type: destination table, column order, DDL and the
 * row transform. The record type set is closed; adding a type means adding
 * a key to RECORD_TYPES and an entry here.
 *
 * Every table is keyed by (id, data_date) so a snapshot date can be
 * reloaded without duplicating rows.
 */

import { toCountStatsRow, toSubjectStatsRow } from "../services/record-validators.js";
import type {
  CountStatsRow,
  DataDate,
  RecordType,
  RowFor,
  StatsRow,
  StatsTableName,
  SubjectStatsRow,
} from "../types.js";

// ═══════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════

export type ColumnOf<TRow extends StatsRow> = keyof TRow & string;

export interface StatsTableSpec<TRow extends StatsRow> {
  recordType: RecordType;
  table: StatsTableName;
  /** Insert column order. Always contains the key columns. */
  columns: readonly ColumnOf<TRow>[];
  /** SQL casts applied to bind parameters, e.g. jsonb */
  casts: Partial<Record<ColumnOf<TRow>, string>>;
  /** Idempotent DDL: table, primary key, indexes */
  schema: readonly string[];
  toRow(raw: unknown, dataDate: DataDate): TRow;
}

export const KEY_COLUMNS = ["id", "data_date"] as const;

export type StatsTables = { [T in RecordType]: StatsTableSpec<RowFor<T>> };

// ═══════════════════════════════════════════════════════════
// Schema DDL
// ═══════════════════════════════════════════════════════════

function countStatsSchema(table: StatsTableName): string[] {
  return [
    `CREATE TABLE IF NOT EXISTS ${table} (
      id INTEGER NOT NULL,
      comments INTEGER DEFAULT 0,
      collects INTEGER DEFAULT 0,
      data_date DATE NOT NULL,
      PRIMARY KEY (id, data_date)
    )`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_comments ON ${table}(comments DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_collects ON ${table}(collects DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_${table}_data_date ON ${table}(data_date)`,
  ];
}

const SUBJECT_STATS_SCHEMA = [
  `CREATE TABLE IF NOT EXISTS subject_stats (
    id INTEGER NOT NULL,
    score NUMERIC(3,1),
    score_details JSONB,
    rank INTEGER,
    favorite JSONB,
    data_date DATE NOT NULL,
    PRIMARY KEY (id, data_date)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_subject_stats_score ON subject_stats(score DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_subject_stats_rank ON subject_stats(rank ASC)`,
  `CREATE INDEX IF NOT EXISTS idx_subject_stats_score_details ON subject_stats USING GIN(score_details)`,
  `CREATE INDEX IF NOT EXISTS idx_subject_stats_favorite ON subject_stats USING GIN(favorite)`,
  `CREATE INDEX IF NOT EXISTS idx_subject_stats_data_date ON subject_stats(data_date)`,
];

// ═══════════════════════════════════════════════════════════
// Registry
// ═══════════════════════════════════════════════════════════

function countStatsTable(recordType: "character" | "person"): StatsTableSpec<CountStatsRow> {
  const table: StatsTableName = `${recordType}_stats`;
  return {
    recordType,
    table,
    columns: ["id", "comments", "collects", "data_date"],
    casts: { data_date: "date" },
    schema: countStatsSchema(table),
    toRow: toCountStatsRow,
  };
}

const subjectStatsTable: StatsTableSpec<SubjectStatsRow> = {
  recordType: "subject",
  table: "subject_stats",
  columns: ["id", "score", "score_details", "rank", "favorite", "data_date"],
  casts: { score_details: "jsonb", favorite: "jsonb", data_date: "date" },
  schema: SUBJECT_STATS_SCHEMA,
  toRow: toSubjectStatsRow,
};

export const STATS_TABLES: StatsTables = {
  character: countStatsTable("character"),
  person: countStatsTable("person"),
  subject: subjectStatsTable,
};

export function tableFor<T extends RecordType>(recordType: T): StatsTables[T] {
  return STATS_TABLES[recordType];
}

/** Columns overwritten when the (id, data_date) key already exists. */
export function updateColumns<TRow extends StatsRow>(spec: StatsTableSpec<TRow>): ColumnOf<TRow>[] {
  const keys: readonly string[] = KEY_COLUMNS;
  return spec.columns.filter((column) => !keys.includes(column));
}
