import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["melvinctl/test/**/*.test.ts"],
    environment: "node"
  }
});
