import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@rulelex/core",
    globals: true,
    environment: "node",
  },
});
