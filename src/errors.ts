/**
 * errors.ts — Error taxonomy for the loader.
 *
 * Record- and batch-level errors are absorbed into ProcessingStats by the
 * processor; type-, revision- and connection-level errors reach the caller.
 */

import type { RecordType } from "./types.js";

export class StatsLoaderError extends Error {
  override readonly name: string = "StatsLoaderError";
}

/** One record failed shape checks. Scoped to that record. */
export class ValidationError extends StatsLoaderError {
  override readonly name = "ValidationError";
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.field = field;
  }
}

/** Database unreachable or credentials rejected. Fatal to the run. */
export class ConnectionError extends StatsLoaderError {
  override readonly name = "ConnectionError";
  readonly host: string;
  readonly database: string;

  constructor(host: string, database: string, options?: ErrorOptions) {
    super(`Cannot connect to database "${database}" at ${host}`, options);
    this.host = host;
    this.database = database;
  }
}

/** Expected source file absent. Fatal to that record type only. */
export class FileNotFoundError extends StatsLoaderError {
  override readonly name = "FileNotFoundError";
  readonly recordType: RecordType;
  readonly path: string;

  constructor(recordType: RecordType, path: string) {
    super(`${recordType} source file not found: ${path}`);
    this.recordType = recordType;
    this.path = path;
  }
}

/** Revision metadata carries no snapshot date. Fatal to that revision only. */
export class DateResolutionError extends StatsLoaderError {
  override readonly name = "DateResolutionError";
  readonly metadata: string;

  constructor(metadata: string) {
    const preview = metadata.trim().split("\n")[0]?.slice(0, 120) ?? "";
    super(`No snapshot date in revision message: "${preview}"`);
    this.metadata = metadata;
  }
}

/** A batch transaction was rolled back. Its rows are counted as failed. */
export class BatchCommitError extends StatsLoaderError {
  override readonly name = "BatchCommitError";
  readonly table: string;
  readonly batchNumber: number;
  readonly rowCount: number;

  constructor(table: string, batchNumber: number, rowCount: number, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Batch ${batchNumber} into ${table} (${rowCount} rows) rolled back${reason}`, options);
    this.table = table;
    this.batchNumber = batchNumber;
    this.rowCount = rowCount;
  }
}

export class UnsupportedTypeError extends StatsLoaderError {
  override readonly name = "UnsupportedTypeError";
  readonly requested: string;

  constructor(requested: string, supported: readonly string[]) {
    super(`Unsupported record type: ${requested}. Supported types: ${supported.join(", ")}`);
    this.requested = requested;
  }
}

/** Force checkout failed; the working tree is in an unknown state. */
export class RevisionCheckoutError extends StatsLoaderError {
  override readonly name = "RevisionCheckoutError";
  readonly revision: string;

  constructor(revision: string, options?: ErrorOptions) {
    super(`Checkout of revision ${revision} failed`, options);
    this.revision = revision;
  }
}
