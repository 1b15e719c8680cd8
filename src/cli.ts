/**
 * cli.ts — Command-line surface
 *
 * Usage:
 *   archive-stats [run] <character|person|subject|all> [limit]
 *   archive-stats [run] [limit]            # all types
 *
 * Modes:
 *   - DATA_START_DATE set → walk archive revisions from that snapshot date
 *     to the newest one, loading each under its own date.
 *   - otherwise → load the current working files once, dated by DATA_DATE
 *     or by the archive's latest revision message.
 *
 * Exit code 0 only when every requested type (and every revision) loaded.
 */

import type { AppConfig } from "./config.js";
import type { ConnectFn } from "./db.js";
import { ConnectionError, DateResolutionError, UnsupportedTypeError } from "./errors.js";
import { log, type Logger } from "./logger.js";
import { loadRecordTypes } from "./services/load-types.js";
import { parseRecordType, SUPPORTED_TYPES } from "./services/processor-factory.js";
import { GitRevisionSource, type RevisionSource } from "./services/revision-source.js";
import { resolveSnapshotDate } from "./services/snapshot-date.js";
import { SnapshotIterator } from "./services/snapshot-iterator.js";
import type { RecordType } from "./types.js";

// ─── Arg parsing ────────────────────────────────────────────────

export interface CliArgs {
  recordTypes: RecordType[];
  limit?: number;
}

const INTEGER = /^-?\d+$/;

function parseLimit(raw: string): number | undefined {
  const limit = Number.parseInt(raw, 10);
  if (!INTEGER.test(raw.trim()) || limit < 1) {
    log.boot.warn({ limit: raw }, "invalid limit ignored, processing all records");
    return undefined;
  }
  return limit;
}

/**
 * @throws UnsupportedTypeError for an unknown type name
 */
export function parseArguments(argv: readonly string[]): CliArgs {
  const args = argv[0]?.toLowerCase() === "run" ? argv.slice(1) : [...argv];
  const [first, second] = args;

  if (first === undefined) {
    return { recordTypes: [...SUPPORTED_TYPES] };
  }

  // A bare number means "all types, limited"
  if (INTEGER.test(first.trim())) {
    return { recordTypes: [...SUPPORTED_TYPES], limit: parseLimit(first) };
  }

  const limit = second === undefined ? undefined : parseLimit(second);
  if (first.trim().toLowerCase() === "all") {
    return { recordTypes: [...SUPPORTED_TYPES], limit };
  }

  const recordType = parseRecordType(first);
  if (recordType === null) {
    throw new UnsupportedTypeError(first, SUPPORTED_TYPES);
  }
  return { recordTypes: [recordType], limit };
}

// ─── Run ────────────────────────────────────────────────────────

export interface CliDeps {
  config: AppConfig;
  /** Defaults to git over config.archiveDir */
  source?: RevisionSource;
  /** Defaults to a real pg connection */
  connect?: ConnectFn;
}

async function runSinglePass(args: CliArgs, deps: CliDeps, source: RevisionSource): Promise<number> {
  const { config } = deps;
  const dataDate = config.dataDate ?? resolveSnapshotDate(await source.latestMessage());
  log.boot.info({ dataDate, recordTypes: args.recordTypes, limit: args.limit }, "single-pass load");

  const report = await loadRecordTypes(args.recordTypes, {
    db: config.db,
    batchSize: config.batchSize,
    connect: deps.connect,
    sourceDir: config.archiveDir,
    dataDate,
    limit: args.limit,
  });

  log.boot.info({ succeeded: report.succeeded, total: report.results.length }, "load finished");
  return report.failed === 0 ? 0 : 1;
}

async function runIteration(args: CliArgs, deps: CliDeps, source: RevisionSource, startDate: string): Promise<number> {
  const { config } = deps;
  log.boot.info({ startDate, recordTypes: args.recordTypes, limit: args.limit }, "iteration mode");

  const iterator = new SnapshotIterator({
    source,
    sourceDir: config.archiveDir,
    recordTypes: args.recordTypes,
    startDate,
    limit: args.limit,
    db: config.db,
    batchSize: config.batchSize,
    connect: deps.connect,
  });
  const report = await iterator.run();

  if (report.revisions.length === 0) return 1;
  return report.partial === 0 && report.skipped === 0 ? 0 : 1;
}

/** Parse, dispatch to the configured mode and map the result to an exit code. */
export async function run(argv: readonly string[], deps: CliDeps): Promise<number> {
  const { config } = deps;
  let args: CliArgs;
  try {
    args = parseArguments(argv);
  } catch (err) {
    if (err instanceof UnsupportedTypeError) {
      log.boot.error({ requested: err.requested, supported: SUPPORTED_TYPES }, err.message);
      return 1;
    }
    throw err;
  }

  const source = deps.source ?? new GitRevisionSource({ repoDir: config.archiveDir, branch: config.archiveBranch });

  try {
    return config.startDate
      ? await runIteration(args, deps, source, config.startDate)
      : await runSinglePass(args, deps, source);
  } catch (err) {
    if (err instanceof ConnectionError || err instanceof DateResolutionError) {
      log.boot.error({ err: err.message }, "run aborted");
      return 1;
    }
    throw err;
  }
}

// ─── Signals ────────────────────────────────────────────────────

/**
 * SIGINT handler: record the interruption, flush pending log lines
 * (the pretty and file transports write from a worker), then exit 1.
 */
export function interruptHandler(logger: Logger, exit: (code: number) => void): () => void {
  return () => {
    logger.warn("interrupted");
    logger.flush(() => exit(1));
  };
}
