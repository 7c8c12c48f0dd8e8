import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "seqflow",
    globals: true,
    environment: "node",
  },
});
