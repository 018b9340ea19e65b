import path from "path";

import { defineConfig } from "vitest/config";

const src = (dir: string): string => path.resolve(__dirname, "src", dir);

export default defineConfig({
  resolve: {
    alias: {
      "@app": src("app"),
      "@config": src("config"),
      "@domain": src("domain"),
      "@infrastructure": src("infrastructure"),
      "@interfaces": src("interfaces"),
      "@middleware": src("middleware"),
      "@routes": src("routes"),
      "@testing": src("testing"),
      "@typesLocal": src("types"),
      "@utils": src("utils"),
    },
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      LOG_FILE: "",
      LOG_LEVEL: "error",
      STORE_DRIVER: "memory",
    },
  },
});
