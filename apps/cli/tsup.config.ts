import { defineConfig, type Options } from "tsup";
import path from "path";
import fs from "fs";

// The esbuild plugin type tsup itself was built against
type Plugin = NonNullable<Options["esbuildPlugins"]>[number];

const root = path.resolve("../..");

// Resolve @dropfour/* imports to the workspace TypeScript sources
const resolveWorkspaceSource: Plugin = {
  name: "resolve-workspace-source",
  setup(build) {
    build.onResolve({ filter: /^@dropfour\// }, (args) => {
      const name = args.path.replace("@dropfour/", "");
      const srcPath = path.resolve(root, `packages/${name}/src/index.ts`);
      if (fs.existsSync(srcPath)) {
        return { path: srcPath };
      }
      return undefined;
    });
  },
};

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: false,
  dts: false,

  // Bundle all workspace packages into the output
  noExternal: [/^@dropfour\//],

  banner: {
    js: "#!/usr/bin/env node",
  },

  esbuildOptions(options) {
    options.jsx = "automatic";
  },

  esbuildPlugins: [resolveWorkspaceSource],
});
