import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // better-sqlite3 is a native addon; child processes keep it out of worker threads.
    pool: "forks",
    testTimeout: 20_000,
  },
});
