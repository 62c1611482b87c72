import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["cjs", "esm"],
  dts: true,
  clean: true,
  target: "node20",
  minify: false,
  sourcemap: true,
  splitting: false,
  outDir: "dist",
});
