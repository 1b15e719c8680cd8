/**
 * snapshot-iterator.ts — Walk archive revisions and load each as its own snapshot.
 *
 * Per revision:  IDLE → CHECKOUT → RESOLVE_DATE → PROCESS → CLEANUP → next | DONE
 *
 * - CHECKOUT is a forced checkout: local modifications in the archive working
 *   tree are discarded. A failed checkout aborts the iteration.
 * - A revision whose message carries no snapshot date goes straight to
 *   CLEANUP and is reported as skipped.
 * - PROCESS failures confined to one record type are reported as partial;
 *   a ConnectionError aborts.
 * - CLEANUP removes the per-type source files; failures there are logged only.
 *
 * Nothing is retried. Re-running is safe because every write is an upsert
 * keyed on (id, data_date).
 */

import { rm } from "node:fs/promises";
import { DateResolutionError } from "../errors.js";
import { log } from "../logger.js";
import { RECORD_TYPES, type DataDate, type RecordType } from "../types.js";
import { loadRecordTypes, sourceFilePath, type LoadTypesReport } from "./load-types.js";
import type { Revision, RevisionSource } from "./revision-source.js";
import { resolveSnapshotDate } from "./snapshot-date.js";
import type { ProcessorOptions } from "./stats-processor.js";

// ═══════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════

export type IterationState = "IDLE" | "CHECKOUT" | "RESOLVE_DATE" | "PROCESS" | "CLEANUP" | "DONE";

export interface SnapshotIteratorOptions extends ProcessorOptions {
  source: RevisionSource;
  /** Archive working tree containing <type>.jsonlines */
  sourceDir: string;
  recordTypes: readonly RecordType[];
  startDate?: DataDate;
  limit?: number;
  onStateChange?: (state: IterationState, revision: Revision | null) => void;
}

export type RevisionStatus = "processed" | "partial" | "skipped";

export interface RevisionOutcome {
  revision: Revision;
  status: RevisionStatus;
  dataDate: DataDate | null;
  report: LoadTypesReport | null;
  error: string | null;
}

export interface IterationReport {
  revisions: RevisionOutcome[];
  processed: number;
  partial: number;
  skipped: number;
}

// ═══════════════════════════════════════════════════════════
// Implementation
// ═══════════════════════════════════════════════════════════

export class SnapshotIterator {
  private current: IterationState = "IDLE";

  constructor(private readonly options: SnapshotIteratorOptions) {}

  get state(): IterationState {
    return this.current;
  }

  async run(): Promise<IterationReport> {
    const { source, startDate } = this.options;
    const revisions = await source.listRevisions(startDate);
    const outcomes: RevisionOutcome[] = [];

    if (revisions.length === 0) {
      log.snapshot.warn({ startDate }, "no revisions to process");
    } else {
      log.snapshot.info({ count: revisions.length, first: revisions[0].id, startDate }, "iterating revisions");
      // Leftovers from an interrupted run must not be loaded under the wrong date.
      await this.cleanup();
    }

    for (const revision of revisions) {
      try {
        outcomes.push(await this.visit(revision));
      } finally {
        this.transition("CLEANUP", revision);
        await this.cleanup();
      }
    }

    this.transition("DONE", null);
    const report = summarize(outcomes);
    log.snapshot.info(
      { processed: report.processed, partial: report.partial, skipped: report.skipped },
      "iteration complete",
    );
    return report;
  }

  private async visit(revision: Revision): Promise<RevisionOutcome> {
    const { source } = this.options;

    this.transition("CHECKOUT", revision);
    await source.checkout(revision);

    this.transition("RESOLVE_DATE", revision);
    let dataDate: DataDate;
    try {
      dataDate = resolveSnapshotDate(await source.latestMessage());
    } catch (err) {
      if (!(err instanceof DateResolutionError)) throw err;
      log.snapshot.warn({ revision: revision.id, err: err.message }, "revision skipped: no snapshot date");
      return { revision, status: "skipped", dataDate: null, report: null, error: err.message };
    }

    this.transition("PROCESS", revision);
    const { recordTypes, sourceDir, limit, db, batchSize, connect } = this.options;
    const report = await loadRecordTypes(recordTypes, { db, batchSize, connect, sourceDir, dataDate, limit });

    const status: RevisionStatus = report.failed === 0 ? "processed" : "partial";
    if (status === "partial") {
      log.snapshot.warn({ revision: revision.id, dataDate, failed: report.failed }, "revision partially processed");
    } else {
      log.snapshot.info({ revision: revision.id, dataDate }, "revision processed");
    }
    return { revision, status, dataDate, report, error: null };
  }

  /** Remove every per-type working file; the next checkout starts clean. */
  private async cleanup(): Promise<void> {
    for (const recordType of RECORD_TYPES) {
      const path = sourceFilePath(this.options.sourceDir, recordType);
      try {
        await rm(path, { force: true });
      } catch (err) {
        log.snapshot.warn({ path, err: err instanceof Error ? err.message : String(err) }, "cleanup failed");
      }
    }
  }

  private transition(state: IterationState, revision: Revision | null): void {
    this.current = state;
    log.snapshot.debug({ state, revision: revision?.id }, "state");
    this.options.onStateChange?.(state, revision);
  }
}

function summarize(outcomes: RevisionOutcome[]): IterationReport {
  const count = (status: RevisionStatus) => outcomes.filter((o) => o.status === status).length;
  return {
    revisions: outcomes,
    processed: count("processed"),
    partial: count("partial"),
    skipped: count("skipped"),
  };
}
