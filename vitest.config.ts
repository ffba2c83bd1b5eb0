import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Environment settings
    environment: "node",

    // Test file patterns
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],

    // Coverage settings
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/__tests__/**"],
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
    },

    // The exhaustive note sweeps take a few seconds
    testTimeout: 30000,
    hookTimeout: 10000,

    // Concurrent execution
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: false,
        maxThreads: 4,
      },
    },

    globals: false,
    watch: false,
    bail: 0,
  },
});
