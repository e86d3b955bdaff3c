import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lazyview/views",
    globals: true,
    environment: "node",
  },
});
