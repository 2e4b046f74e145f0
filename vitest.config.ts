import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "src"),
    },
  },
  test: {
    globals: false,
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 10_000,
    env: {
      SQL_PROVIDER_API_KEY: "",
      SQL_PROVIDER_MODE: "playground",
      LOG_LEVEL: "warn",
    },
  },
});
