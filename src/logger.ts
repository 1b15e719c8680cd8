/**
 * logger.ts — Structured logging
 *
 * Built on pino.
 *
 * Configuration:
 *   STATS_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   STATS_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   STATS_DEBUG      — "true" sets level to "debug"
 *   STATS_LOG_FILE   — Also append NDJSON records to this file
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.boot.info("loader starting");
 *   log.ingest.info({ table: "subject_stats", inserted: 12 }, "file processed");
 *   log.db.error({ err }, "batch rolled back");
 *
 * Subsystem loggers:
 *   log.boot, log.ingest, log.db, log.snapshot
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

/** Resolve log level from environment */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  const isDev = env.NODE_ENV !== "production" && !isTest;

  if (env.STATS_LOG_LEVEL) {
    return env.STATS_LOG_LEVEL;
  }
  const debugEnv = (env.STATS_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

const PRETTY_TARGET = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "HH:MM:ss.l",
    ignore: "pid,hostname",
  },
};

/**
 * Build pino transport configuration.
 * With STATS_LOG_FILE set, records also go to that file as NDJSON, next to
 * the console (pretty or plain stdout).
 */
export function resolveTransport(
  env: NodeJS.ProcessEnv = process.env,
): pino.TransportSingleOptions | pino.TransportMultiOptions | undefined {
  const isTest = env.NODE_ENV === "test" || env.VITEST === "true";
  if (isTest) return undefined;

  const isDev = env.NODE_ENV !== "production";
  const wantPretty =
    env.STATS_LOG_PRETTY === "true" ||
    (env.STATS_LOG_PRETTY !== "false" && isDev);
  const logFile = (env.STATS_LOG_FILE || "").trim();

  if (!logFile) {
    return wantPretty ? PRETTY_TARGET : undefined;
  }

  const level = resolveLevel(env);
  const consoleTarget = wantPretty
    ? { ...PRETTY_TARGET, level }
    : { target: "pino/file", level, options: { destination: 1 } };
  return {
    targets: [
      consoleTarget,
      { target: "pino/file", level, options: { destination: logFile, mkdir: true } },
    ],
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: resolveLevel(),
  ...(transport ? { transport } : {}),
  base: { service: "archive-stats" },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Connection strings and configs pass through log context on failure paths.
  redact: {
    paths: ["password", "*.password", "connectionString", "*.connectionString"],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  /** CLI startup, argument handling, exit status */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Per-file processing and per-type runs */
  ingest: rootLogger.child({ subsystem: "ingest" }),
  /** Connections, schema, batch commits */
  db: rootLogger.child({ subsystem: "db" }),
  /** Revision iteration and snapshot dating */
  snapshot: rootLogger.child({ subsystem: "snapshot" }),
  root: rootLogger,
};

export type { Logger };
