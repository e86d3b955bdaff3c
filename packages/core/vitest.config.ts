import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lazyview/core",
    globals: true,
    environment: "node",
  },
});
