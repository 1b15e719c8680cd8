/**
 * load-types.ts — Run one processor per record type against a source directory.
 *
 * Types run strictly one after another, each with its own connection that is
 * closed before the next type starts. A failure confined to one type (missing
 * file, DDL error) is recorded and the next type proceeds; a ConnectionError
 * aborts the whole run.
 */

import { join } from "node:path";
import { ConnectionError } from "../errors.js";
import { log } from "../logger.js";
import type { DataDate, ProcessingStats, RecordType } from "../types.js";
import { createProcessor } from "./processor-factory.js";
import type { ProcessorOptions } from "./stats-processor.js";

export interface LoadTypesOptions extends ProcessorOptions {
  sourceDir: string;
  dataDate: DataDate;
  limit?: number;
}

export type TypeLoadResult =
  | { recordType: RecordType; ok: true; stats: ProcessingStats }
  | { recordType: RecordType; ok: false; error: Error };

export interface LoadTypesReport {
  results: TypeLoadResult[];
  succeeded: number;
  failed: number;
}

/** `<sourceDir>/<type>.jsonlines` */
export function sourceFilePath(sourceDir: string, recordType: RecordType): string {
  return join(sourceDir, `${recordType}.jsonlines`);
}

async function loadOne(recordType: RecordType, options: LoadTypesOptions): Promise<ProcessingStats> {
  const processor = createProcessor(recordType, options);
  try {
    await processor.connect();
    await processor.ensureSchema();
    return await processor.processFile(sourceFilePath(options.sourceDir, recordType), options.dataDate, options.limit);
  } finally {
    await processor.close();
  }
}

export async function loadRecordTypes(
  recordTypes: readonly RecordType[],
  options: LoadTypesOptions,
): Promise<LoadTypesReport> {
  const results: TypeLoadResult[] = [];

  for (const recordType of recordTypes) {
    log.ingest.info({ recordType, dataDate: options.dataDate }, "loading record type");
    try {
      const stats = await loadOne(recordType, options);
      results.push({ recordType, ok: true, stats });
    } catch (err) {
      if (err instanceof ConnectionError) throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      log.ingest.error({ recordType, err: error.message }, "record type failed");
      results.push({ recordType, ok: false, error });
    }
  }

  const succeeded = results.filter((r) => r.ok).length;
  return { results, succeeded, failed: results.length - succeeded };
}
