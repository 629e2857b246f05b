import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: [
      {
        // @specs-feup/flow@1.0.0 is published without its compiled `out/`
        // directory; resolve its subpath imports to the shipped sources.
        find: /^@specs-feup\/flow\/(.*)$/,
        replacement: fileURLToPath(
          new URL("./node_modules/@specs-feup/flow/src/$1.ts", import.meta.url),
        ),
      },
    ],
  },
  test: {
    include: ["test/**/*_test.ts"],
    environment: "node",
  },
});
