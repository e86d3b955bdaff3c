import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@lazyview/access",
    globals: true,
    environment: "node",
  },
});
