import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources, no build needed.
    alias: {
      "@inispan/parser": fromRoot("./packages/parser/src/index.ts"),
      "@inispan/typed": fromRoot("./packages/typed/src/index.ts"),
      "@inispan/lsp": fromRoot("./packages/lsp/src/index.ts"),
    },
  },
});
