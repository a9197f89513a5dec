import { defineConfig } from "vitest/config";

// Pin workflow settings so a developer's .env never changes expected output in tests.
process.env.RESULTS_FILE = "results.json";
process.env.VALIDATION_ERRORS_MAX_LENGTH = "500";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    setupFiles: ["tests/setup.ts"]
  }
});
