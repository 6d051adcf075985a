import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      FETCH_MAX_ATTEMPTS: "2",
    },
  },
});
