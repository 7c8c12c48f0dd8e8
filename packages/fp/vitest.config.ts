import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqflow/fp",
    globals: true,
    environment: "node",
  },
});
