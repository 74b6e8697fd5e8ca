import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/__tests__/**/*.test.ts"],
    environment: "happy-dom",
    // Plain pretty-printed DOM in messages
    env: { COLORS: "false" },
    testTimeout: 5000,
    hookTimeout: 5000,
    setupFiles: ["./packages/core/vitest.setup.ts"],
  },
});
