import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  resolve: {
    alias: {
      "#types": fileURLToPath(new URL("./src/types/index.ts", import.meta.url)),
      "#core": fileURLToPath(new URL("./src/core", import.meta.url)),
    },
  },
  test: {
    include: ["test/**/*.test.ts"],
  },
});
