import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/__tests__/**/*.spec.ts",
      "packages/*/tests/**/*.{test,spec}.ts",
    ],
    environment: "node",
  },
});
