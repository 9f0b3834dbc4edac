import path from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const dirname = path.dirname(fileURLToPath(import.meta.url));

const resolveFromRoot = (...segments: string[]) => path.resolve(dirname, ...segments);

export default defineConfig({
  resolve: {
    alias: {
      "@descent/identity": resolveFromRoot("packages/identity/src/index.ts"),
      "@descent/kernel": resolveFromRoot("packages/kernel/src/index.ts"),
      "@descent/toy-worlds": resolveFromRoot("packages/toy-worlds/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
