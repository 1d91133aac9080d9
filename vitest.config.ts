import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Fixture workbooks are written to per-test temp directories.
    testTimeout: 20_000,
  },
});
