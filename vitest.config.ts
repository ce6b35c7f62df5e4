import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

function packageSource(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      reporter: ["text", "lcov"],
    },
  },
  resolve: {
    alias: {
      "@histograph/utils": packageSource("utils"),
      "@histograph/graph": packageSource("graph"),
      "@histograph/store-files": packageSource("store-files"),
      "@histograph/commands": packageSource("commands"),
    },
  },
});
