/**
 * Vite configuration for the browser bundle.
 *
 * Pages are rendered on the server, so the only client output is the small
 * script that fetches recommendations and validates the auth forms. It is
 * written to dist/public/static/app.js; files under public/ (stylesheet) are
 * copied alongside it. The Node entry serves dist/public at /static/*.
 */

import { defineConfig } from "vite";

export default defineConfig({
  publicDir: "public",
  build: {
    outDir: "./dist/public",
    emptyOutDir: true,
    sourcemap: true,
    rollupOptions: {
      input: "./src/client/main.ts",
      output: {
        entryFileNames: "static/app.js",
        assetFileNames: "static/[name][extname]",
      },
    },
  },
});
