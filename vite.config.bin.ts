/**
 * Vite config for building the command line.
 *
 * Compiles src/bin/zls-provisioner.ts to dist/zls-provisioner.js as an ES
 * module; Node built-ins and runtime dependencies stay external.
 */

import { builtinModules } from "node:module";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

const external = [
  ...builtinModules,
  ...builtinModules.map((name) => `node:${name}`),
  /^electron-log(\/|$)/,
  "execa",
  "tar",
  "yauzl",
  "zod",
];

export default defineConfig({
  build: {
    lib: {
      entry: fileURLToPath(new URL("src/bin/zls-provisioner.ts", import.meta.url)),
      formats: ["es"],
      fileName: () => "zls-provisioner.js",
    },
    outDir: "dist",
    emptyOutDir: true,
    target: "node20",
    minify: false,
    // Don't report gzip sizes (not relevant for CLI scripts)
    reportCompressedSize: false,
    rollupOptions: {
      external,
      output: { banner: "#!/usr/bin/env node" },
    },
  },
});
