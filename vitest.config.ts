import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

function local(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url));
}

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@plantop\/sdk\/testing$/, replacement: local("./packages/sdk/src/testing/index.ts") },
      { find: /^@plantop\/sdk$/, replacement: local("./packages/sdk/src/index.ts") },
      { find: /^@plantop\/shared$/, replacement: local("./packages/shared/src/index.ts") },
      { find: /^@plantop\/core$/, replacement: local("./packages/core/src/index.ts") },
    ],
  },
});
