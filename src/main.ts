#!/usr/bin/env node
import { interruptHandler, run } from "./cli.js";
import { resolveConfig } from "./config.js";
import { log } from "./logger.js";

process.on("SIGINT", interruptHandler(log.boot, (code) => process.exit(code)));

async function main(): Promise<void> {
  const config = resolveConfig();
  log.boot.info(
    { archiveDir: config.archiveDir, host: config.db.host, database: config.db.database, startDate: config.startDate },
    "archive stats loader starting",
  );
  process.exitCode = await run(process.argv.slice(2), { config });
}

main().catch((err) => {
  log.boot.fatal({ err: err instanceof Error ? err.message : String(err) }, "fatal error");
  process.exitCode = 1;
});
