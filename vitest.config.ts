// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Keep pino quiet unless a test opts in
    env: {
      SCRATCH_LOG_LEVEL: "silent",
    },
    include: ["test/**/*.spec.ts"],
    pool: "threads",
  },
});
