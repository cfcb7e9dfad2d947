import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

function pkg(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      "@session-board/core": pkg("core"),
      "@session-board/service": pkg("service"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.{ts,tsx}"],
    environment: "node",
  },
});
