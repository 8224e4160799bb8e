import { relinka } from "@reliverse/relinka";

import { resolveProjectPaths } from "./config.js";
import { InvalidArgumentError, errorMessage } from "./errors.js";
import { VersionManager } from "./impl.js";
import { BUMP_TYPES, isBumpType } from "./version.js";

export const USAGE = `stampver - keep version and build number in sync

Updates:
  src/version.rs         VERSION and BUILD constants
  Cargo.toml             package version
  VERSION_MANAGEMENT.md  "## Current Version" block

Usage:
  stampver bump patch      # 0.2.6 -> 0.2.7
  stampver bump minor      # 0.2.6 -> 0.3.0
  stampver bump major      # 0.2.6 -> 1.0.0
  stampver bump build      # 0001 -> 0002
  stampver set 1.4.0       # explicit version, build back to 0001
  stampver show            # display current version
  stampver check           # report files that disagree

Options:
  --dry-run    print what would change without writing
  --root DIR   project root (defaults to the nearest directory with Cargo.toml)`;

export type CommandInput = {
  command?: string;
  arg?: string;
  dryRun?: boolean;
  root?: string;
  cwd?: string;
};

// parsed args are read by key so the shape does not depend on rempts' inference
const readArg = (args: object, key: string): unknown =>
  Object.entries(args).find(([name]) => name === key)?.[1];

const asString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

export const toCommandInput = (args: object): CommandInput => ({
  command: asString(readArg(args, "command")),
  arg: asString(readArg(args, "value")),
  dryRun: readArg(args, "dryRun") === true,
  root: asString(readArg(args, "root")),
});

const COMMANDS = ["show", "bump", "set", "check"] as const;
type Command = (typeof COMMANDS)[number];

const isCommand = (value: string): value is Command =>
  COMMANDS.some((command) => command === value);

const usageError = (message: string): number => {
  relinka("error", `❌ Error: ${message}`);
  relinka("log", USAGE);
  return 1;
};

/**
 * Runs one command and returns the process exit code. Every error is
 * reported here as a single line.
 */
export async function runCommand(input: CommandInput): Promise<number> {
  const { command, arg } = input;

  if (!command) {
    relinka("log", USAGE);
    return 1;
  }
  if (!isCommand(command)) {
    return usageError(`Unknown command '${command}'`);
  }
  if (command === "bump" && !arg) {
    return usageError(
      `bump command requires type (${BUMP_TYPES.join("|")})`,
    );
  }
  if (command === "set" && !arg) {
    return usageError("set command requires a version (X.Y.Z)");
  }

  try {
    if (command === "bump" && arg && !isBumpType(arg)) {
      throw new InvalidArgumentError(`Invalid bump type: ${arg}`);
    }

    const paths = await resolveProjectPaths({
      root: input.root,
      cwd: input.cwd,
    });
    const manager = new VersionManager(paths, { dryRun: input.dryRun });

    switch (command) {
      case "show":
        await manager.show();
        break;
      case "bump":
        await manager.bump(arg ?? "");
        break;
      case "set":
        await manager.set(arg ?? "");
        break;
      case "check": {
        const results = await manager.check();
        const problems = results.filter(
          (r) => r.detectedVersion === null || r.versionMismatch,
        );
        if (problems.length > 0) {
          relinka("error", `❌ Error: ${problems.length} file(s) out of sync`);
          return 1;
        }
        relinka("success", "All files are in sync");
        return 0;
      }
    }
    return 0;
  } catch (error) {
    relinka("error", `❌ Error: ${errorMessage(error)}`);
    return 1;
  }
}
