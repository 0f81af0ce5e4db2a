import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      include: ["src/**/*.ts"],
      thresholds: {
        lines: 70,
        statements: 70,
        branches: 60,
        functions: 70,
      },
      // Adapters below need a live PostgreSQL or Redis.
      exclude: [
        "src/index.ts",
        "src/ports/**",
        "src/domain/types.ts",
        "src/adapters/postgres/**",
        "src/adapters/redis/**",
        "src/adapters/durable/**",
      ],
    },
  },
});
