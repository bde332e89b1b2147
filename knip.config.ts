import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/rowcast": {
      entry: ["src/index.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
      ignore: ["**/test-utils.ts"],
    },
  },
};

export default config;
