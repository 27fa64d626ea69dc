import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqfuse/collections",
    environment: "node",
  },
});
