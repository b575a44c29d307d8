import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@swiss-uid/shared": fileURLToPath(new URL("./packages/shared/src", import.meta.url)),
      "@swiss-uid/uid": fileURLToPath(new URL("./packages/uid/src", import.meta.url))
    }
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"]
  }
});
