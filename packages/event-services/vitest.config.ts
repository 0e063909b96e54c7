import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    name: "event-services",
    root: fileURLToPath(new URL(".", import.meta.url)),
    include: ["src/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@campus-events/shared": fileURLToPath(new URL("../shared/src/index.ts", import.meta.url)),
    },
  },
});
