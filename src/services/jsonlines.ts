import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";

export type JsonLine =
  | { lineNumber: number; value: unknown }
  | { lineNumber: number; error: string };

export interface ReadJsonLinesOptions {
  /** Stop after this many non-blank lines */
  limit?: number;
}

/**
 * Lazily decode a line-delimited JSON file.
 *
 * Single pass: the generator owns the file handle and releases it when it
 * finishes or when the consumer stops iterating. Blank lines are skipped
 * and do not count towards `limit`; a line that fails to parse is yielded
 * as an error entry so the caller can tally it and move on.
 */
export async function* readJsonLines(path: string, options: ReadJsonLinesOptions = {}): AsyncGenerator<JsonLine> {
  const { limit } = options;
  if (limit !== undefined && limit <= 0) return;

  const stream = createReadStream(path, { encoding: "utf-8" });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  let lineNumber = 0;
  let read = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      const text = (lineNumber === 1 ? line.replace(/^\uFEFF/, "") : line).trim();
      if (!text) continue;

      read++;
      let entry: JsonLine;
      try {
        entry = { lineNumber, value: JSON.parse(text) };
      } catch (err) {
        entry = { lineNumber, error: err instanceof Error ? err.message : String(err) };
      }
      yield entry;

      if (limit !== undefined && read >= limit) break;
    }
  } finally {
    lines.close();
    stream.destroy();
  }
}
