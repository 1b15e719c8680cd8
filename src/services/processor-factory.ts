import { UnsupportedTypeError } from "../errors.js";
import { log } from "../logger.js";
import { STATS_TABLES } from "../stores/stats-tables.js";
import { RECORD_TYPES, type RecordType } from "../types.js";
import { StatsProcessor, type Processor, type ProcessorOptions } from "./stats-processor.js";

export const SUPPORTED_TYPES: readonly RecordType[] = RECORD_TYPES;

function normalizeTypeName(name: string): string {
  return name.trim().toLowerCase();
}

export function isSupportedType(name: string): boolean {
  return parseRecordType(name) !== null;
}

/** Normalized record type for a user-supplied name, or null. */
export function parseRecordType(name: string): RecordType | null {
  const normalized = normalizeTypeName(name);
  return SUPPORTED_TYPES.find((type) => type === normalized) ?? null;
}

/**
 * Build the processor for a record type name.
 * @throws UnsupportedTypeError for names outside SUPPORTED_TYPES
 */
export function createProcessor(name: string, options: ProcessorOptions): Processor {
  const recordType = parseRecordType(name);
  if (recordType === null) {
    throw new UnsupportedTypeError(name, SUPPORTED_TYPES);
  }
  log.ingest.debug({ recordType }, "creating processor");

  switch (recordType) {
    case "character":
    case "person":
      return new StatsProcessor(STATS_TABLES[recordType], options);
    case "subject":
      return new StatsProcessor(STATS_TABLES.subject, options);
  }
}
