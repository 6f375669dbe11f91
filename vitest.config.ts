import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["monitor/src/test/**/*.test.ts"],
    setupFiles: ["monitor/src/test/setup.ts"],
    testTimeout: 10000,
  },
});
