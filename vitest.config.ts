/**
 * Vitest Configuration
 *
 * Unit tests run against the in-memory store; route tests use Fastify inject.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,

    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],

    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      include: [
        "src/services/**/*.ts",
        "src/routes/**/*.ts",
        "src/schemas/**/*.ts",
        "src/middleware/**/*.ts",
        "src/utils/**/*.ts",
      ],
      exclude: ["**/*.test.ts", "**/*.d.ts", "src/server.ts", "src/db/**"],
    },

    testTimeout: 30000,
    hookTimeout: 30000,

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    setupFiles: ["./tests/setup.ts"],

    sequence: {
      shuffle: false,
    },
  },
});
