import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/integration/**/*.test.ts"],
    testTimeout: 15_000,
    globals: false,
  },
});
