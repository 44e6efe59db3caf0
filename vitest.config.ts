import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

const here = fileURLToPath(new URL(".", import.meta.url));

const packageSource = (name: string) => resolve(here, "packages", name, "src/index.ts");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      "@blisskit/utils": packageSource("utils"),
      "@blisskit/core": packageSource("core"),
      "@blisskit/classifier": packageSource("classifier"),
      "@blisskit/semantics": packageSource("semantics"),
      "@blisskit/composer": packageSource("composer"),
      "@blisskit/engine": packageSource("engine"),
    },
  },
});
