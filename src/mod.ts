export type {
  BumpOptions,
  BumpType,
  FileCheck,
  ProjectPaths,
  StampverConfig,
  VersionFile,
  VersionPair,
  VersionTriple,
  WriteResult,
} from "./types.js";

export {
  ConfigError,
  ConversionError,
  FormatError,
  InvalidArgumentError,
  NotFoundError,
  ParseError,
  StampverError,
} from "./errors.js";
export type { StampverErrorCode } from "./errors.js";

export {
  BUMP_TYPES,
  INITIAL_BUILD,
  bumpVersion,
  formatBuild,
  formatVersion,
  fullVersionInfo,
  isBumpType,
  parseBuild,
  parseVersion,
  validateCustomVersion,
  versionString,
} from "./version.js";

export { constantsFile, docFile, manifestFile } from "./files.js";
export {
  CONFIG_FILE,
  DEFAULT_CONFIG,
  findProjectRoot,
  loadConfig,
  resolveProjectPaths,
} from "./config.js";
export { NEXT_STEPS, VersionManager } from "./impl.js";
export { USAGE, runCommand, toCommandInput } from "./run.js";
export type { CommandInput } from "./run.js";
