/**
 * stats-processor.ts — One record type, one connection, one file at a time.
 *
 * Lifecycle: connect → ensureSchema → processFile (any number of times) → close.
 * Record- and batch-level failures are tallied into ProcessingStats and never
 * thrown; a missing source file or an unreachable database is.
 */

import { stat } from "node:fs/promises";
import { initSchema, openConnection, type ConnectFn, type DbConfig, type DbConnection } from "../db.js";
import { FileNotFoundError, StatsLoaderError, ValidationError } from "../errors.js";
import { log } from "../logger.js";
import { BatchUpserter } from "../stores/batch-upserter.js";
import type { StatsTableSpec } from "../stores/stats-tables.js";
import type { DataDate, ProcessingStats, RecordType, StatsRow, StatsTableName } from "../types.js";
import { readJsonLines } from "./jsonlines.js";
import { isValidDataDate } from "./snapshot-date.js";

export interface Processor {
  readonly recordType: RecordType;
  readonly table: StatsTableName;
  connect(): Promise<void>;
  ensureSchema(): Promise<void>;
  processFile(path: string, dataDate: DataDate, limit?: number): Promise<ProcessingStats>;
  close(): Promise<void>;
}

export interface ProcessorOptions {
  db: DbConfig;
  batchSize?: number;
  /** Connection factory; defaults to a real pg client */
  connect?: ConnectFn;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export class StatsProcessor<TRow extends StatsRow> implements Processor {
  private connection: DbConnection | null = null;
  private readonly connectFn: ConnectFn;

  constructor(
    private readonly spec: StatsTableSpec<TRow>,
    private readonly options: ProcessorOptions,
  ) {
    this.connectFn = options.connect ?? openConnection;
  }

  get recordType(): RecordType {
    return this.spec.recordType;
  }

  get table(): StatsTableName {
    return this.spec.table;
  }

  async connect(): Promise<void> {
    if (this.connection) return;
    this.connection = await this.connectFn(this.options.db);
    log.db.info({ table: this.table, host: this.options.db.host, database: this.options.db.database }, "connected");
  }

  async ensureSchema(): Promise<void> {
    await initSchema(this.requireConnection(), this.spec.schema);
    log.db.debug({ table: this.table }, "schema ensured");
  }

  async processFile(path: string, dataDate: DataDate, limit?: number): Promise<ProcessingStats> {
    const conn = this.requireConnection();
    if (!isValidDataDate(dataDate)) {
      throw new StatsLoaderError(`Invalid data date "${dataDate}" (expected YYYY-MM-DD)`);
    }
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`limit must be a positive integer, got ${limit}`);
    }
    if (!(await isFile(path))) {
      throw new FileNotFoundError(this.recordType, path);
    }

    const started = Date.now();
    log.ingest.info({ recordType: this.recordType, path, dataDate, limit }, "processing file");

    const upserter = new BatchUpserter(conn, this.spec, { batchSize: this.options.batchSize });
    let totalRead = 0;
    let invalid = 0;

    for await (const line of readJsonLines(path, { limit })) {
      totalRead++;
      if ("error" in line) {
        invalid++;
        log.ingest.warn({ recordType: this.recordType, line: line.lineNumber, err: line.error }, "malformed JSON line");
        continue;
      }

      let row: TRow;
      try {
        row = this.spec.toRow(line.value, dataDate);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        invalid++;
        log.ingest.debug({ recordType: this.recordType, line: line.lineNumber, field: err.field }, err.message);
        continue;
      }

      await upserter.push(row);
    }

    const outcome = await upserter.finish();
    const stats: ProcessingStats = {
      recordType: this.recordType,
      path,
      dataDate,
      totalRead,
      inserted: outcome.inserted,
      updated: outcome.updated,
      skipped: outcome.skipped,
      failed: invalid + outcome.failed,
      batches: outcome.batches,
      failedBatches: outcome.failedBatches,
      durationMs: Date.now() - started,
    };

    log.ingest.info(stats, "file processed");
    return stats;
  }

  /** Safe to call repeatedly, and before connect(). */
  async close(): Promise<void> {
    const conn = this.connection;
    if (!conn) return;
    this.connection = null;
    await conn.end();
    log.db.info({ table: this.table }, "connection closed");
  }

  private requireConnection(): DbConnection {
    if (!this.connection) {
      throw new StatsLoaderError(`${this.recordType} processor is not connected`);
    }
    return this.connection;
  }
}
