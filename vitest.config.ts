import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    setupFiles: ["./tests/helpers/setup.ts"],
    pool: "forks",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
  },
});
