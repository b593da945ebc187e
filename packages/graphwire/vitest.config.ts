import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "graphwire",
    globals: false,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
