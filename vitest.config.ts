import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (pkg: string) => fileURLToPath(new URL(`./${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@rubric/core": src("packages/core"),
      "@rubric/rules": src("packages/rules"),
      "@rubric/scoring": src("packages/scoring"),
      "@rubric/train": src("packages/train"),
      "@rubric/db": src("packages/db"),
      "@rubric/effect-runtime": src("packages/effect-runtime"),
      "@rubric/cli": src("apps/cli"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    testTimeout: 30_000,
  },
});
