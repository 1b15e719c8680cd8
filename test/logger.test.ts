/**
 * logger.test.ts — Level resolution and subsystem loggers
 */

import { describe, it, expect } from "vitest";
import { log, resolveLevel, resolveTransport, rootLogger } from "../src/logger.js";

describe("resolveLevel", () => {
  it("honors STATS_LOG_LEVEL first", () => {
    expect(resolveLevel({ STATS_LOG_LEVEL: "warn", STATS_DEBUG: "true" })).toBe("warn");
  });

  it("STATS_DEBUG enables debug", () => {
    expect(resolveLevel({ STATS_DEBUG: "true", NODE_ENV: "production" })).toBe("debug");
    expect(resolveLevel({ STATS_DEBUG: "0", NODE_ENV: "production" })).toBe("info");
    expect(resolveLevel({ STATS_DEBUG: "false", NODE_ENV: "test" })).toBe("silent");
  });

  it("picks a default per environment", () => {
    expect(resolveLevel({ NODE_ENV: "test" })).toBe("silent");
    expect(resolveLevel({ NODE_ENV: "production" })).toBe("info");
    expect(resolveLevel({ NODE_ENV: "development" })).toBe("debug");
    expect(resolveLevel({})).toBe("debug");
  });
});

describe("resolveTransport", () => {
  const pretty = {
    target: "pino-pretty",
    options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "pid,hostname" },
  };

  it("uses no transport under tests, even with a log file", () => {
    expect(resolveTransport({ NODE_ENV: "test", STATS_LOG_FILE: "logs/run.log" })).toBeUndefined();
  });

  it("writes plain stdout in production and pretty output in development", () => {
    expect(resolveTransport({ NODE_ENV: "production" })).toBeUndefined();
    expect(resolveTransport({ NODE_ENV: "development" })).toEqual(pretty);
    expect(resolveTransport({ NODE_ENV: "production", STATS_LOG_PRETTY: "true" })).toEqual(pretty);
  });

  it("adds a file target next to stdout when STATS_LOG_FILE is set", () => {
    expect(resolveTransport({ NODE_ENV: "production", STATS_LOG_FILE: "logs/run.log" })).toEqual({
      targets: [
        { target: "pino/file", level: "info", options: { destination: 1 } },
        { target: "pino/file", level: "info", options: { destination: "logs/run.log", mkdir: true } },
      ],
    });
  });

  it("keeps pretty console output alongside the file in development", () => {
    expect(resolveTransport({ NODE_ENV: "development", STATS_LOG_FILE: " stats.log " })).toEqual({
      targets: [
        { ...pretty, level: "debug" },
        { target: "pino/file", level: "debug", options: { destination: "stats.log", mkdir: true } },
      ],
    });
  });
});

describe("log", () => {
  it("is silent under the test runner", () => {
    expect(rootLogger.level).toBe("silent");
  });

  it("exposes one child per subsystem", () => {
    expect(Object.keys(log)).toEqual(["boot", "ingest", "db", "snapshot", "root"]);
    expect(log.db.bindings()).toMatchObject({ subsystem: "db" });
  });
});
