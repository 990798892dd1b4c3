import { defineConfig } from "tsup";
import type { Options } from "tsup";

export default defineConfig((options: Options) => ({
  entry: [
    "src/index.ts",
    "src/schemas/index.ts",
    "src/logger/index.ts",
    "src/constants/index.ts",
    "src/errors/index.ts",
  ],
  format: ["esm"],
  dts: true,
  splitting: false,
  sourcemap: true,
  // Keep dist in place while the engine watches it
  clean: !options.watch,
  treeshake: true,
}));
