import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Keep config resolution deterministic: tests pass their own env objects,
    // but the logger reads these at module load.
    env: {
      STATS_LOG_LEVEL: "",
      STATS_DEBUG: "",
      STATS_LOG_FILE: "",
      DATABASE_URL: "",
      DATA_START_DATE: "",
      DATA_DATE: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
    },
    // Isolate tests to avoid module state leaks
    pool: "forks",
    testTimeout: 10000,
  },
});
