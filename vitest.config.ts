import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@adforge/shared": path.resolve(__dirname, "packages/shared/src/index.ts"),
      "@adforge/api": path.resolve(__dirname, "apps/api/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["{packages,apps}/**/src/**/*.test.ts"],
    testTimeout: 20000,
  },
});
