import { defineConfig, type Options } from "tsup";

// The workspace packages export TypeScript sources, so they are bundled in.
// Their third-party dependencies stay external and are declared by the CLI.
export const buildOptions = {
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  sourcemap: true,
  clean: true,
  noExternal: ["@stylepack/core", "@stylepack/types"],
  external: [
    "@iarna/toml",
    "chalk",
    "commander",
    "handlebars",
    "js-yaml",
    "json5",
    "jsonc-parser",
    "ora",
    "picomatch",
    "pino",
    "pino-pretty",
    "zod",
    "zod-to-json-schema",
  ],
  bundle: true,
  splitting: false,
} satisfies Options;

export default defineConfig(buildOptions);
