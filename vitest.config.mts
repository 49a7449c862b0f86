// vitest.config.mts
//
// Vitest configuration for calcexpr.
// - TypeScript-first, Node environment
// - Coverage tuned for a small library

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Use global test functions (describe, it, expect, etc.)
    globals: true,

    environment: "node",

    include: ["tests/**/*.spec.ts", "tests/**/*.test.ts"],

    exclude: ["node_modules", "dist", "coverage"],

    coverage: {
      provider: "v8",
      reportsDirectory: "coverage",
      reporter: ["text", "html", "lcov"],

      include: ["src/**/*.ts"],

      exclude: [
        "src/**/*.d.ts",
        "src/index.ts", // re-exports only
        "src/cli/index.ts", // process bootstrap
      ],

      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    // Reset mocks and spies between tests.
    clearMocks: true,
    restoreMocks: true,
  },
});
