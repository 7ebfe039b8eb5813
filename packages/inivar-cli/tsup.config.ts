import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  target: "node20",
  // The library ships TypeScript sources; bundle it into the executable
  noExternal: ["inivar"],
  banner: {
    js: "#!/usr/bin/env node",
  },
});
