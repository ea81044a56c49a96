// Vitest config
// - runs in the Node.js environment
// - maps NodeNext-style `.js` relative imports onto the `.ts` sources

import fs from "node:fs";
import path from "node:path";

import { defineConfig } from "vitest/config";

function resolveTsFromJsImport() {
  return {
    name: "librarian-resolve-ts-from-js-import",
    enforce: "pre" as const,
    resolveId(source: string, importer?: string) {
      if (!importer) return null;
      if (!source.startsWith(".") && !source.startsWith("/")) return null;
      if (!source.endsWith(".js")) return null;

      const resolvedJs = path.resolve(path.dirname(importer), source);
      if (fs.existsSync(resolvedJs)) return null;

      const resolvedTs = resolvedJs.slice(0, -3) + ".ts";
      if (fs.existsSync(resolvedTs)) return resolvedTs;

      return null;
    },
  };
}

export default defineConfig({
  plugins: [resolveTsFromJsImport()],
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
