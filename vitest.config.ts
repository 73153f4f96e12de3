import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@monthly-digest/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@monthly-digest/provider-github": path.join(rootDir, "packages/provider-github/src/index.ts"),
      "@monthly-digest/provider-bigquery": path.join(rootDir, "packages/provider-bigquery/src/index.ts"),
      "@monthly-digest/renderer-rst": path.join(rootDir, "packages/renderer-rst/src/index.ts"),
      "@monthly-digest/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"]
  }
});
