import { createRequire } from "node:module";
import { defineConfig } from "vitest/config";

const require = createRequire(import.meta.url);

export default defineConfig({
  resolve: {
    alias: {
      // drizzle-kit's ESM build calls require() internally; load its CommonJS build instead
      "drizzle-kit/api": require.resolve("drizzle-kit/api"),
    },
  },
  test: {
    include: ["src/**/__tests__/**/*.test.ts"],
    env: {
      DATABASE_URL: ":memory:",
      SESSION_SECRET: "test-secret",
      NODE_ENV: "test",
      OPENROUTER_API_KEY: "test-key",
    },
  },
});
