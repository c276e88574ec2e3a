import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    globals: true,
    setupFiles: [],
    env: {
      MOCK_OPENAI: "1",
      ENABLE_OTEL: "false",
      SQL_AGENT_MAX_ATTEMPTS: "3",
      ANALYSIS_MAX_ROWS: "20",
      ANALYSIS_MAX_COLUMNS: "12",
      DOCSTORE_API_URL: "http://docstore.test/api",
      DOCSTORE_API_KEY: "test-key"
    }
  }
});
