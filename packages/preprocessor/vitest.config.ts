import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@strid/preprocessor",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
