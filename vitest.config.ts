import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
