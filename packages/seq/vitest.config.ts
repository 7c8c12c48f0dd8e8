import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqflow/seq",
    globals: true,
    environment: "node",
  },
});
