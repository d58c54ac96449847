import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "src/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
    },
    testTimeout: 10_000,
  },
});
