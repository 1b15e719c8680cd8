/**
 * config.ts — Configuration resolution
 *
 * Single source of truth for all configuration. Priority chain:
 *   1. Environment variable
 *   2. Default
 *
 * Rules:
 * - All configuration resolves through `resolveConfig()`
 * - No `process.env` reads outside this file (except logger bootstrap)
 * - Config object is fully typed
 */

import { resolve } from "node:path";
import type { DbConfig } from "./db.js";
import { DEFAULT_BATCH_SIZE, MAX_BATCH_SIZE } from "./stores/batch-upserter.js";
import { isValidDataDate } from "./services/snapshot-date.js";

// ─── Configuration Interface ────────────────────────────────────

export interface AppConfig {
  // ── System ──────────────────────────────────────────────────
  /** Node environment (production, development, test) */
  nodeEnv: string;
  isTest: boolean;
  isDev: boolean;

  // ── Database ────────────────────────────────────────────────
  db: DbConfig;

  // ── Source archive ──────────────────────────────────────────
  /** Working tree holding the <type>.jsonlines files and their history */
  archiveDir: string;
  /** Branch walked in iteration mode */
  archiveBranch: string;

  // ── Loading ─────────────────────────────────────────────────
  /** Rows per upsert transaction (default: 1000, max: MAX_BATCH_SIZE) */
  batchSize: number;
  /** When set, the CLI walks revisions from this snapshot date onward */
  startDate: string | null;
  /** Overrides the snapshot date in single-pass mode */
  dataDate: string | null;
}

// ─── Resolution Helpers ─────────────────────────────────────────

function parsePort(raw: string | undefined): number {
  const port = parseInt(raw || "5432", 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`DB_PORT must be an integer between 1 and 65535, got "${raw}"`);
  }
  return port;
}

function parseBatchSize(raw: string | undefined): number {
  if (!raw) return DEFAULT_BATCH_SIZE;
  const value = raw.trim();
  const size = Number(value);
  // Bounded by the widest table's bind-parameter limit
  if (!/^\d+$/.test(value) || size < 1 || size > MAX_BATCH_SIZE) {
    throw new Error(`BATCH_SIZE must be an integer between 1 and ${MAX_BATCH_SIZE}, got "${raw}"`);
  }
  return size;
}

function parseDate(name: string, raw: string | undefined): string | null {
  const value = (raw || "").trim();
  if (!value) return null;
  if (!isValidDataDate(value)) {
    throw new Error(`${name} must be a YYYY-MM-DD date, got "${value}"`);
  }
  return value;
}

/**
 * Database parameters. DATABASE_URL wins over the discrete DB_* variables.
 */
function resolveDbConfig(env: NodeJS.ProcessEnv): DbConfig {
  if (env.DATABASE_URL) {
    const url = new URL(env.DATABASE_URL);
    return {
      host: url.hostname || "localhost",
      port: parsePort(url.port || undefined),
      database: decodeURIComponent(url.pathname.replace(/^\//, "")) || "bangumi",
      user: decodeURIComponent(url.username) || "postgres",
      password: decodeURIComponent(url.password),
    };
  }
  return {
    host: env.DB_HOST || "localhost",
    port: parsePort(env.DB_PORT),
    database: env.DB_NAME || "bangumi",
    user: env.DB_USER || "postgres",
    password: env.DB_PASSWORD ?? "postgres",
  };
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve complete application configuration.
 * Throws on malformed values so the CLI fails before touching the database.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;

  return {
    nodeEnv,
    isTest,
    isDev,
    db: resolveDbConfig(env),
    archiveDir: resolve(env.ARCHIVE_DIR || "bangumiArchive"),
    archiveBranch: env.ARCHIVE_BRANCH || "master",
    batchSize: parseBatchSize(env.BATCH_SIZE),
    startDate: parseDate("DATA_START_DATE", env.DATA_START_DATE),
    dataDate: parseDate("DATA_DATE", env.DATA_DATE),
  };
}
