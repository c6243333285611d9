// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Parallel-iteration specs use real timers; keep failures quick
    testTimeout: 10_000,
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});
