import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/nanoident": {
      entry: ["src/index.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
      ignore: ["**/test-utils.ts"],
    },
    "packages/benchmarks": {
      entry: ["src/main.ts", "src/index.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
    },
  },
};

export default config;
