import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "deps/shared/test/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    watch: false,
  },
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
      "~shared": fileURLToPath(new URL("./deps/shared/src", import.meta.url)),
    },
  },
});
