// vitest.config.mts
//
// Vitest configuration for flowbind.
// - Node environment (the engine has no DOM dependencies)
// - Specs live under tests/{unit,integration,security}
// - Coverage via V8

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",

    include: ["tests/**/*.spec.ts"],
    exclude: ["node_modules", "dist", "coverage"],

    // Keeps winston quiet unless TEST_LOG_LEVEL is set.
    env: {
      NODE_ENV: "test",
    },

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/index.ts"],
    },

    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
  },
});
