import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Test against the core sources, not its build output
      "@rulelex/core": path.resolve(__dirname, "../lexer/src/index.ts"),
    },
  },
  test: {
    name: "@rulelex/postfix",
    globals: true,
    environment: "node",
  },
});
