import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // Scheduler and server tests bind ports and swap fake timers.
    fileParallelism: false,
  },
});
