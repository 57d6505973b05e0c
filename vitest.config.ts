import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["planner/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    pool: "forks"
  }
});
