/**
 * Supported bump types:
 * - major: 1.2.3 → 2.0.0, build reset to 0001
 * - minor: 1.2.3 → 1.3.0, build reset to 0001
 * - patch: 1.2.3 → 1.2.4, build reset to 0001
 * - build: version unchanged, 0007 → 0008
 */
export type BumpType = "major" | "minor" | "patch" | "build";

export type VersionTriple = [major: bigint, minor: bigint, patch: bigint];

export type VersionPair = {
  version: string;
  build: string;
};

export type WriteResult = {
  content: string;
  /** false when the file's pattern was not found and content is unchanged */
  matched: boolean;
};

/**
 * A single version-bearing artifact. Each implementation owns the pattern
 * used to find its fields and the replacement written back.
 */
export type VersionFile = {
  readonly label: string;
  readField: (content: string) => Partial<VersionPair>;
  writeField: (content: string, pair: VersionPair) => WriteResult;
};

export type ProjectPaths = {
  root: string;
  constantsFile: string;
  manifestFile: string;
  docFile: string;
};

export type StampverConfig = {
  constantsFile?: string;
  manifestFile?: string;
  docFile?: string;
};

export type BumpOptions = {
  dryRun?: boolean;
};

export type FileCheck = {
  file: string;
  label: string;
  detectedVersion: string | null;
  versionMismatch: boolean;
  reason: string;
};
