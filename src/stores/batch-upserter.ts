/**
 * batch-upserter.ts — Buffered multi-row upserts keyed on (id, data_date)
 *
 * Rows are buffered and committed in fixed-size batches. Each batch is one
 * INSERT ... ON CONFLICT DO UPDATE statement inside its own transaction;
 * a batch that fails is rolled back, its rows are counted as failed and
 * the next batch still runs.
 *
 * Pattern:
 *   const upserter = new BatchUpserter(conn, STATS_TABLES.subject, { batchSize: 500 });
 *   for (const row of rows) await upserter.push(row);
 *   const outcome = await upserter.finish();
 */

import { withTransaction, type DbConnection } from "../db.js";
import { BatchCommitError } from "../errors.js";
import { log } from "../logger.js";
import { RECORD_TYPES, type StatsRow } from "../types.js";
import { KEY_COLUMNS, STATS_TABLES, updateColumns, type StatsTableSpec } from "./stats-tables.js";

// ═══════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════

export interface BatchOutcome {
  inserted: number;
  updated: number;
  /** Rows superseded by a later row with the same key in the same batch */
  skipped: number;
  failed: number;
  batches: number;
  failedBatches: number;
}

export interface BatchUpserterOptions {
  batchSize?: number;
}

export const DEFAULT_BATCH_SIZE = 1000;

/** Postgres caps a single statement at 65535 bind parameters. */
export const MAX_BIND_PARAMETERS = 65_535;

/** Rows one statement can carry for a table of `columnCount` columns. */
export function maxBatchRows(columnCount: number): number {
  return Math.floor(MAX_BIND_PARAMETERS / columnCount);
}

/** Largest batch size every destination table accepts. */
export const MAX_BATCH_SIZE = Math.min(
  ...RECORD_TYPES.map((recordType) => maxBatchRows(STATS_TABLES[recordType].columns.length)),
);

// ═══════════════════════════════════════════════════════════
// SQL
// ═══════════════════════════════════════════════════════════

/**
 * Multi-row upsert for `rowCount` rows. `xmax = 0` on the returned tuple
 * means the row was freshly inserted rather than updated in place.
 */
export function buildUpsertSql<TRow extends StatsRow>(spec: StatsTableSpec<TRow>, rowCount: number): string {
  const width = spec.columns.length;
  const tuples: string[] = [];
  for (let r = 0; r < rowCount; r++) {
    const params = spec.columns.map((column, c) => {
      const cast = spec.casts[column];
      const placeholder = `$${r * width + c + 1}`;
      return cast ? `${placeholder}::${cast}` : placeholder;
    });
    tuples.push(`(${params.join(", ")})`);
  }

  const assignments = updateColumns(spec).map((column) => `${column} = EXCLUDED.${column}`);

  return `INSERT INTO ${spec.table} (${spec.columns.join(", ")})
VALUES ${tuples.join(",\n       ")}
ON CONFLICT (${KEY_COLUMNS.join(", ")}) DO UPDATE SET
  ${assignments.join(",\n  ")}
RETURNING (xmax = 0) AS inserted`;
}

export function rowParameters<TRow extends StatsRow>(spec: StatsTableSpec<TRow>, rows: readonly TRow[]): unknown[] {
  return rows.flatMap((row) => spec.columns.map((column) => row[column]));
}

// ═══════════════════════════════════════════════════════════
// Implementation
// ═══════════════════════════════════════════════════════════

export class BatchUpserter<TRow extends StatsRow> {
  readonly batchSize: number;

  private buffer = new Map<string, TRow>();
  private readonly counters: BatchOutcome = {
    inserted: 0,
    updated: 0,
    skipped: 0,
    failed: 0,
    batches: 0,
    failedBatches: 0,
  };

  constructor(
    private readonly conn: DbConnection,
    private readonly spec: StatsTableSpec<TRow>,
    options: BatchUpserterOptions = {},
  ) {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const maxRows = maxBatchRows(spec.columns.length);
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > maxRows) {
      throw new RangeError(`batchSize for ${spec.table} must be an integer in [1, ${maxRows}], got ${batchSize}`);
    }
    this.batchSize = batchSize;
  }

  get outcome(): BatchOutcome {
    return { ...this.counters };
  }

  /** Buffer one row; commits a batch once the buffer is full. */
  async push(row: TRow): Promise<void> {
    const key = `${row.id}|${row.data_date}`;
    // One statement cannot touch the same key twice; the later row wins.
    if (this.buffer.has(key)) {
      this.counters.skipped++;
    }
    this.buffer.set(key, row);

    if (this.buffer.size >= this.batchSize) {
      await this.flush();
    }
  }

  /** Commit whatever is still buffered and return the final counters. */
  async finish(): Promise<BatchOutcome> {
    await this.flush();
    return this.outcome;
  }

  private async flush(): Promise<void> {
    if (this.buffer.size === 0) return;

    const rows = [...this.buffer.values()];
    this.buffer = new Map();
    const batchNumber = ++this.counters.batches;

    try {
      const result = await withTransaction(this.conn, (c) =>
        c.query(buildUpsertSql(this.spec, rows.length), rowParameters(this.spec, rows)),
      );
      // Rows without the flag count as inserted
      const updated = result.rows.filter((r) => r.inserted === false).length;
      this.counters.updated += updated;
      this.counters.inserted += rows.length - updated;
      log.db.debug({ table: this.spec.table, batch: batchNumber, rows: rows.length, updated }, "batch committed");
    } catch (err) {
      const error = new BatchCommitError(this.spec.table, batchNumber, rows.length, { cause: err });
      this.counters.failed += rows.length;
      this.counters.failedBatches++;
      log.db.error({ table: error.table, batch: error.batchNumber, rows: error.rowCount, err: error.message }, "batch rolled back");
    }
  }
}
