import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["src/main.ts"],
  outDir: "dist",
  format: "esm",
  platform: "node",
  // Workspace packages ship TypeScript sources; inline them into the CLI.
  noExternal: [/^@keysweep\//],
  outExtensions: () => ({ js: ".js" }),
  clean: true,
  sourcemap: false,
});
