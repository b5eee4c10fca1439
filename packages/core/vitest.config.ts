import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@treecodec/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
