import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    server: {
      deps: {
        inline: ["clipanion"],
      },
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/index.ts",
        "src/channels/adapter.ts",
        "src/channels/twitch/index.ts",
        "src/channels/twitch/client.ts",
        "src/channels/discord/index.ts",
        "src/channels/discord/client.ts",
        "src/cli/banner.ts",
        "src/cli/program.ts",
        "src/cli/commands/run.ts",
        "src/runtime/lifecycle.ts",
        "src/config/types.ts",
      ],
      thresholds: {
        statements: 70,
        branches: 70,
        functions: 70,
        lines: 70,
      },
    },
  },
});
