import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["mcp-servers/*/src/**/*.test.ts"],
  },
});
