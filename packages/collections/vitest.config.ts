import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqflow/collections",
    globals: true,
    environment: "node",
  },
});
