import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@treecodec/codec",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
