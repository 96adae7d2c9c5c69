// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - this makes them available to tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      // Make environment variables available
      env,
      testTimeout: 10_000,
      // Run tests in parallel by default
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
