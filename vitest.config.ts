import { defineConfig } from "vitest/config";
import { resolve } from "path";
import { fileURLToPath } from "url";

const __dirname = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  resolve: {
    // Point workspace packages at their TypeScript sources so tests don't
    // require the packages to be built first.
    alias: {
      "@tracewire/core":   resolve(__dirname, "packages/core/src/index.ts"),
      "@tracewire/simple": resolve(__dirname, "packages/simple/src/index.ts"),
      "@tracewire/b3":     resolve(__dirname, "packages/b3/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
  },
});
