import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const WORKSPACE_PACKAGES = [
  "types",
  "errors",
  "logger",
  "config",
  "chunker",
  "parser",
  "embeddings",
  "generator",
  "vector-index",
  "core",
];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      WORKSPACE_PACKAGES.map((name) => [
        `@docqa/${name}`,
        fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
      ]),
    ),
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node",
  },
});
