import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["server/**/*.test.ts", "src/**/*.test.ts", "tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
    },
  },
});
