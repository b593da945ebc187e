import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "notifications",
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
