import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (path: string): string =>
  fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    alias: {
      "@amie-usage/core/node": pkg("core/src/node.ts"),
      "@amie-usage/core": pkg("core/src/index.ts"),
      "@amie-usage/logger": pkg("logger/src/index.ts"),
      "@amie-usage/usage": pkg("usage/src/index.ts"),
    },
  },
});
