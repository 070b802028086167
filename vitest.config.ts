import { defineConfig } from "vitest/config";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Resolve @tidewire/shared to its source so vitest can follow its deps
      {
        find: /^@tidewire\/shared\/testing$/,
        replacement: path.resolve(root, "packages/shared/src/testing/index.ts"),
      },
      {
        find: /^@tidewire\/shared$/,
        replacement: path.resolve(root, "packages/shared/src/index.ts"),
      },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    // Let vitest resolve transitive deps from workspace packages
    server: {
      deps: {
        inline: [/^@tidewire\//, "zod", "@google/genai", "neo4j-driver"],
      },
    },
  },
});
