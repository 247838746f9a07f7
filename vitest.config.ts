import { defineConfig } from "vitest/config";
import path from "path";

const packageSrc = (name: string) => path.resolve(__dirname, "packages", name, "src");

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/test/**/*.spec.ts"]
  },
  resolve: {
    alias: [
      { find: "@ui-rescale/shared", replacement: packageSrc("shared") },
      { find: "@ui-rescale/logger", replacement: packageSrc("logger") },
      { find: "@ui-rescale/scaler", replacement: packageSrc("scaler") }
    ]
  }
});
