import { defineConfig } from "vite";
import { resolve } from "path";
import { fileURLToPath } from "url";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  root: ".",
  build: {
    outDir: "dist",
    emptyOutDir: true,
    lib: {
      entry: resolve(root, "src/engine/index.ts"),
      formats: ["es"],
      fileName: "index",
    },
  },
});
