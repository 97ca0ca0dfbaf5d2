import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // Sandboxed tests chdir, which worker threads do not allow.
    pool: "forks",
  },
});
