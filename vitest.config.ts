// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.spec.ts"],
    pool: "threads",
    testTimeout: 20_000,
  },
});
