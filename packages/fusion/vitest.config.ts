import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@seqfuse/fusion",
    environment: "node",
  },
});
