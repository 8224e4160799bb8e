import semver from "semver";

import type { BumpType, VersionPair, VersionTriple } from "./types.js";

import {
  ConversionError,
  FormatError,
  InvalidArgumentError,
} from "./errors.js";

export const BUMP_TYPES: readonly BumpType[] = [
  "major",
  "minor",
  "patch",
  "build",
];

export const INITIAL_BUILD = "0001";

const BUILD_WIDTH = 4;
const DIGITS = /^\d+$/;

export const isBumpType = (value: string): value is BumpType =>
  BUMP_TYPES.some((type) => type === value);

// components are unbounded, so they are kept as bigint
const toInteger = (part: string, source: string): bigint => {
  if (!DIGITS.test(part)) {
    throw new ConversionError(
      `invalid numeric component "${part}" in "${source}"`,
    );
  }
  return BigInt(part);
};

// parse "X.Y.Z" into its three integer components
export const parseVersion = (version: string): VersionTriple => {
  const parts = version.split(".");
  if (parts.length !== 3) {
    throw new FormatError(`Invalid version format: ${version}`);
  }
  const [major, minor, patch] = parts.map((part) => toInteger(part, version));
  return [major ?? 0n, minor ?? 0n, patch ?? 0n];
};

export const formatVersion = ([major, minor, patch]: VersionTriple): string =>
  `${major}.${minor}.${patch}`;

export const parseBuild = (build: string): bigint => toInteger(build, build);

// widens past 9999 instead of wrapping
export const formatBuild = (build: bigint): string =>
  build.toString().padStart(BUILD_WIDTH, "0");

/**
 * Computes the next version/build pair. Any semantic bump resets the build
 * counter; a build bump keeps the version string exactly as it was.
 */
export const bumpVersion = (
  current: VersionPair,
  bumpType: string,
): VersionPair => {
  let [major, minor, patch] = parseVersion(current.version);

  switch (bumpType) {
    case "major":
      major += 1n;
      minor = 0n;
      patch = 0n;
      break;
    case "minor":
      minor += 1n;
      patch = 0n;
      break;
    case "patch":
      patch += 1n;
      break;
    case "build":
      return {
        version: current.version,
        build: formatBuild(parseBuild(current.build) + 1n),
      };
    default:
      throw new InvalidArgumentError(`Invalid bump type: ${bumpType}`);
  }

  return {
    version: formatVersion([major, minor, patch]),
    build: INITIAL_BUILD,
  };
};

// explicit versions must be plain semver triples (no prefix, no prerelease)
export const validateCustomVersion = (version: string): string => {
  if (semver.valid(version) !== version || semver.prerelease(version)) {
    throw new InvalidArgumentError(`Invalid custom version: ${version}`);
  }
  return formatVersion(parseVersion(version));
};

export const versionString = ({ version, build }: VersionPair): string =>
  `v${version}-${build}`;

export const fullVersionInfo = (
  name: string,
  { version, build }: VersionPair,
): string => `${name} ${version} (Build ${build})`;
