import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqflow/std",
    globals: true,
    environment: "node",
  },
});
