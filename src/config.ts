import { relinka } from "@reliverse/relinka";
import fs from "fs-extra";
import { fileURLToPath } from "node:url";
import path from "pathe";

import type { ProjectPaths, StampverConfig } from "./types.js";

import { ConfigError, NotFoundError, errorMessage } from "./errors.js";

export const CONFIG_FILE = ".config/stampver.json";

export const DEFAULT_CONFIG: Required<StampverConfig> = {
  constantsFile: "src/version.rs",
  manifestFile: "Cargo.toml",
  docFile: "VERSION_MANAGEMENT.md",
};

const CONFIG_KEYS = ["constantsFile", "manifestFile", "docFile"] as const;

// the package root when installed, or the repo root when run from source
const INSTALL_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);

const isProjectRoot = async (dir: string): Promise<boolean> =>
  (await fs.pathExists(path.join(dir, DEFAULT_CONFIG.manifestFile))) ||
  (await fs.pathExists(path.join(dir, CONFIG_FILE)));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads `.config/stampver.json` from the project root. Missing file means
 * defaults; every present key must be a string path relative to the root.
 */
export async function loadConfig(root: string): Promise<StampverConfig> {
  const configPath = path.join(root, CONFIG_FILE);
  if (!(await fs.pathExists(configPath))) {
    relinka("verbose", `No ${CONFIG_FILE} found, using default paths`);
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(configPath, "utf8"));
  } catch (error) {
    throw new ConfigError(
      `Could not read ${CONFIG_FILE}: ${errorMessage(error)}`,
    );
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`${CONFIG_FILE} must contain a JSON object`);
  }

  const config: StampverConfig = {};
  for (const key of CONFIG_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string" || value.trim() === "") {
      throw new ConfigError(
        `"${key}" in ${CONFIG_FILE} must be a non-empty string`,
      );
    }
    config[key] = value.trim();
  }
  relinka("verbose", `Loaded config from ${configPath}`);
  return config;
}

// nearest directory at or above `start` that looks like a project root
async function findUpward(start: string): Promise<string | null> {
  let dir = path.resolve(start);
  for (;;) {
    if (await isProjectRoot(dir)) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Locates the project root: an explicit directory wins, then the nearest
 * ancestor of `cwd` holding the manifest (or a config file), then the nearest
 * such ancestor of the installed tool, which finds the consuming project from
 * `node_modules/stampver`.
 */
export async function findProjectRoot(options: {
  root?: string;
  cwd?: string;
  installRoot?: string;
}): Promise<string> {
  if (options.root) {
    const explicit = path.resolve(options.root);
    if (!(await isProjectRoot(explicit))) {
      throw new NotFoundError(
        `Could not find ${DEFAULT_CONFIG.manifestFile} in ${explicit}`,
      );
    }
    return explicit;
  }

  const fromCwd = await findUpward(options.cwd ?? process.cwd());
  if (fromCwd) return fromCwd;

  const fromInstall = await findUpward(options.installRoot ?? INSTALL_ROOT);
  if (fromInstall) return fromInstall;

  throw new NotFoundError(`Could not find ${DEFAULT_CONFIG.manifestFile}`);
}

export async function resolveProjectPaths(options: {
  root?: string;
  cwd?: string;
}): Promise<ProjectPaths> {
  const root = await findProjectRoot(options);
  const config = { ...DEFAULT_CONFIG, ...(await loadConfig(root)) };
  const paths: ProjectPaths = {
    root,
    constantsFile: path.resolve(root, config.constantsFile),
    manifestFile: path.resolve(root, config.manifestFile),
    docFile: path.resolve(root, config.docFile),
  };

  if (!(await fs.pathExists(paths.manifestFile))) {
    throw new NotFoundError(`Could not find ${config.manifestFile}`);
  }
  relinka("verbose", `Project root: ${root}`);
  return paths;
}
