import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages are tested from their sources, never from dist
    alias: {
      "@fedora-l10n/shared": source("shared"),
      "@fedora-l10n/core": source("core"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.{ts,tsx}"],
    setupFiles: ["./vitest.setup.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      // Plain frames for assertions on rendered output
      FORCE_COLOR: "0",
    },
  },
});
