import { defineConfig } from "vitest/config";

/**
 * Vitest configuration for graph-crawler.
 *
 * Unit tests run against the in-process memory stores and fixture platform
 * client; nothing here needs a database or network access.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/", "dist/"],
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
    testTimeout: 20000,
    hookTimeout: 10000,
    pool: "forks",
  },
});
