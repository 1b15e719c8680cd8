/**
 * fixtures.ts — Temporary archive directories and JSON-lines source files.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AppConfig } from "../../src/config.js";
import type { RecordType } from "../../src/types.js";
import { TEST_DB_CONFIG } from "./fake-db.js";

const dirs: string[] = [];

export async function makeArchiveDir(prefix = "archive-stats-"): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  dirs.push(dir);
  return dir;
}

/** Remove every directory created through makeArchiveDir. Call from afterEach. */
export async function removeArchiveDirs(): Promise<void> {
  for (const dir of dirs) {
    await rm(dir, { recursive: true, force: true });
  }
  dirs.length = 0;
}

/** Objects are serialized; strings are written verbatim (for malformed lines). */
export async function writeJsonLines(
  dir: string,
  recordType: RecordType,
  lines: ReadonlyArray<string | Record<string, unknown> | unknown[]>,
): Promise<string> {
  const path = join(dir, `${recordType}.jsonlines`);
  const body = lines.map((line) => (typeof line === "string" ? line : JSON.stringify(line))).join("\n");
  await writeFile(path, `${body}\n`, "utf-8");
  return path;
}

/** `count` character records with ids 1..count. */
export function characterRecords(count: number): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, i) => ({ id: i + 1, comments: i, collects: i * 2 }));
}

/** Build a test AppConfig with overrides. */
export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    nodeEnv: "test",
    isTest: true,
    isDev: false,
    db: TEST_DB_CONFIG,
    archiveDir: tmpdir(),
    archiveBranch: "master",
    batchSize: 1000,
    startDate: null,
    dataDate: null,
    ...overrides,
  };
}
