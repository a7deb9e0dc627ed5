import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // tsc writes compiled copies of the tests into dist/
    exclude: ["**/node_modules/**", "**/dist/**"],
    environment: "node"
  }
});
