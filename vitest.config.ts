import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      RESCAFFOLD_LOG_LEVEL: "silent",
    },
  },
});
