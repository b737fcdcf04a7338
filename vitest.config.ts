import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

function packageSource(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@meshlens/types": packageSource("types"),
      "@meshlens/apiserver": packageSource("apiserver"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.test.ts", "packages/*/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "**/dist/**"],
  },
});
