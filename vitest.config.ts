import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    env: {
      CV_DB_PATH: ":memory:",
      CV_LOG_LEVEL: "error",
    },
  },
});
