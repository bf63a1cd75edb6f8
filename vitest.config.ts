import { defineConfig } from "vitest/config";

import { aliases } from "./vitest.aliases";

const defaultExclude = ["**/node_modules/**", "**/dist/**", "**/coverage/**"];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: defaultExclude,
    server: {
      deps: {
        inline: [/@docksheet\/.*/],
      },
    },
  },
});
