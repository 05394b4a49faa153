import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Tests stub global fetch and share temp directories.
    fileParallelism: false,
  },
});
