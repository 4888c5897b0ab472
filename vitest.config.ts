import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    env: { NODE_ENV: "test", LOG_LEVEL: "silent" },
    include: ["**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
  },
});
