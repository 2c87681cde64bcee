import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    pool: "forks",
    env: {
      LOG_TO_FILE: "false",
      TZ: "UTC",
    },
  },
});
