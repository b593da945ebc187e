import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/graphwire", "packages/examples/notifications"],
    coverage: {
      exclude: [
        ...(configDefaults.coverage.exclude ?? []),
        "**/src/runtime.ts",
        "**/src/test.ts",
        "**/*.test.ts",
      ],
      provider: "v8",
      reporter: ["text", "json", "html", "lcov"],
      reportsDirectory: "./analytics/coverage",
    },
  },
});
