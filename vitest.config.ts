import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts", "tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@parley/types": pkg("types"),
      "@parley/core": pkg("core"),
      "@parley/tools": pkg("tools"),
      "@parley/runtime": pkg("runtime"),
      "@parley/persistence": pkg("persistence"),
    },
  },
});
