import { runMain, defineCommand, defineArgs } from "@reliverse/rempts";

import { runCommand, toCommandInput } from "./run.js";

const main = defineCommand({
  meta: {
    name: "stampver",
    description:
      "Keeps the version and build number in sync across version.rs, Cargo.toml and VERSION_MANAGEMENT.md.",
  },
  args: defineArgs({
    command: {
      type: "positional",
      required: false,
      description: "show | bump | set | check",
    },
    value: {
      type: "positional",
      required: false,
      description: "Bump type (major|minor|patch|build) or version for set",
    },
    dryRun: {
      type: "boolean",
      description: "Preview changes without writing files",
    },
    root: {
      type: "string",
      description: "Project root containing Cargo.toml",
    },
  }),
  async run({ args }: { args: object }) {
    const exitCode = await runCommand(toCommandInput(args));
    process.exit(exitCode);
  },
});

await runMain(main);
