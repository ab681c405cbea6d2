import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      REDIS_URL: "redis://:test-secret@localhost:6379",
      METRICS_API_KEY: "test-metrics-key",
      CORS_ORIGINS: "http://localhost:3000,https://dashboard.example.test",
    },
  },
});
