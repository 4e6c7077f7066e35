import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    setupFiles: ["src/tablewright/testing/setup.ts"],
    testTimeout: 10000,
  },
});
