import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@strid/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
