import { DateResolutionError } from "../errors.js";
import type { DataDate } from "../types.js";

/** Archive revisions are committed as "... dump-2025-09-02.210328Z.zip ..." */
const DUMP_NAME_PATTERN = /dump-(\d{4}-\d{2}-\d{2})\.\d+Z\.zip/;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a YYYY-MM-DD string naming a real calendar day. */
export function isValidDataDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y)
    && date.getUTCMonth() === Number(m) - 1
    && date.getUTCDate() === Number(d)
  );
}

export function tryResolveSnapshotDate(message: string): DataDate | null {
  const match = DUMP_NAME_PATTERN.exec(message);
  if (!match) return null;
  const date = match[1];
  return isValidDataDate(date) ? date : null;
}

/**
 * Extract the snapshot date from a revision's metadata message.
 * @throws DateResolutionError when the message names no dump archive
 */
export function resolveSnapshotDate(message: string): DataDate {
  const date = tryResolveSnapshotDate(message);
  if (date == null) {
    throw new DateResolutionError(message);
  }
  return date;
}
