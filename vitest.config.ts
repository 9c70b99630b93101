import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      reportsDirectory: "coverage",
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 90,
        statements: 90,
      },
      exclude: [
        "**/*.test.ts",
        // Barrel re-export files (no logic, just re-exports)
        "src/index.ts",
        "src/hosts/index.ts",
      ],
    },
  },
});
