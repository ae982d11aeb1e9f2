// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - this makes CALX_* settings available to tests
  const env = loadEnv(mode, process.cwd(), "CALX_");

  return {
    test: {
      env,
      environment: "node",
      include: ["test/**/*.spec.ts"],
    },
  };
});
