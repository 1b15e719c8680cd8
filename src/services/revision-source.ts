/**
 * revision-source.ts — Narrow collaborator over the archive's version history.
 *
 * The iteration controller only needs three operations, so that is all this
 * interface exposes. GitRevisionSource implements them with the git CLI;
 * tests substitute an in-memory source.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { RevisionCheckoutError } from "../errors.js";
import { log } from "../logger.js";
import type { DataDate } from "../types.js";
import { tryResolveSnapshotDate } from "./snapshot-date.js";

const execFileAsync = promisify(execFile);

export interface Revision {
  /** Commit hash or other stable identifier */
  id: string;
  /** First line of the revision's metadata message */
  subject: string;
}

export interface RevisionSource {
  /** Revisions oldest → newest, starting at the first one dated on/after `fromDate`. */
  listRevisions(fromDate?: DataDate): Promise<Revision[]>;
  /** Force-switch the working tree, discarding local modifications. */
  checkout(revision: Revision): Promise<void>;
  /** Full metadata message of the checked-out revision. */
  latestMessage(): Promise<string>;
}

/**
 * Index of the first revision whose subject names a snapshot dated on or
 * after `fromDate`, or -1 when none does.
 */
export function startIndex(revisions: readonly Revision[], fromDate: DataDate): number {
  return revisions.findIndex((revision) => {
    const date = tryResolveSnapshotDate(revision.subject);
    return date !== null && date >= fromDate;
  });
}

// Separates hash and subject in `git log` output; never appears in either.
const FIELD_SEPARATOR = "\x1f";

export function parseRevisionLog(output: string): Revision[] {
  const revisions: Revision[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const sep = line.indexOf(FIELD_SEPARATOR);
    const id = (sep < 0 ? line : line.slice(0, sep)).trim();
    const subject = sep < 0 ? "" : line.slice(sep + 1);
    revisions.push({ id, subject });
  }
  return revisions;
}

export interface GitRevisionSourceOptions {
  repoDir: string;
  branch?: string;
  gitBin?: string;
}

export class GitRevisionSource implements RevisionSource {
  private readonly branch: string;
  private readonly gitBin: string;

  constructor(private readonly options: GitRevisionSourceOptions) {
    this.branch = options.branch ?? "master";
    this.gitBin = options.gitBin ?? "git";
  }

  async listRevisions(fromDate?: DataDate): Promise<Revision[]> {
    const output = await this.git(["log", "--reverse", `--pretty=format:%H${FIELD_SEPARATOR}%s`, this.branch]);
    const revisions = parseRevisionLog(output);
    if (fromDate === undefined) return revisions;

    const start = startIndex(revisions, fromDate);
    log.snapshot.debug({ total: revisions.length, start, fromDate }, "revisions listed");
    return start < 0 ? [] : revisions.slice(start);
  }

  async checkout(revision: Revision): Promise<void> {
    try {
      await this.git(["checkout", "-f", revision.id]);
    } catch (err) {
      throw new RevisionCheckoutError(revision.id, { cause: err });
    }
  }

  async latestMessage(): Promise<string> {
    return this.git(["log", "-1", "--pretty=%B"]);
  }

  private async git(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.gitBin, ["-C", this.options.repoDir, ...args], {
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });
    return stdout;
  }
}
