import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    pool: "threads", // or: 'vmThreads'
    include: ["packages/*/src/**/*.test.ts"],
    hookTimeout: 30000,
  },
});
