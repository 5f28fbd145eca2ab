import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [{ find: /^#\//, replacement: fileURLToPath(new URL("./src/", import.meta.url)) }],
  },
  test: {
    include: ["src/**/*.test.ts"],
    env: {
      HSTACK_LOG_LEVEL: "silent",
    },
  },
});
