import { defineConfig } from "vite";

export default defineConfig({
  // Relative asset paths so a build can be opened straight from disk
  base: "./",
  server: {
    port: 3000,
    open: "/",
  },
  build: {
    outDir: "dist",
    target: "es2022",
    sourcemap: true,
  },
});
