import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // CLI tests
      {
        test: {
          name: "strid",
          environment: "node",
          include: ["tests/**/*.test.ts"],
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["src/**/*.ts", "packages/*/src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/*.test.ts"],
    },

    testTimeout: 30000,
  },
});
