import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const templateRoot = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: templateRoot,
  test: {
    environment: "node",
    include: ["server/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
  },
});
