import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
    // Keep test runs out of the append-only log
    env: { LOG_FILE: "" },
  },
});
