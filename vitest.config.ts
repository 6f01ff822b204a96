import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["**/dist/**", "**/node_modules/**"],
    testTimeout: 15000,
  },
});
