import { defineConfig } from "tsdown"

export default defineConfig({
  entry: ["./src/index.ts"],
  tsconfig: "tsconfig.json",
  format: "esm",
  platform: "node",
  target: "node20",
  outDir: "dist",
  clean: true,
  sourcemap: true,
  treeshake: true,
  dts: false,
  shims: false,
  fixedExtension: true,
  nodeProtocol: true,
})
