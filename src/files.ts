import type { VersionFile, VersionPair, WriteResult } from "./types.js";

// patterns to find version fields in each artifact
const patterns = {
  constantsVersion: /(\bVERSION:[^=\n]*=\s*")([^"]+)(")/,
  constantsBuild: /(\bBUILD:[^=\n]*=\s*")([^"]+)(")/,
  manifestVersion: /^(version = ")([^"]+)(")/m,
  docBlock:
    /## Current Version\s+- \*\*Version\*\*: ([^\n]+)\s+- \*\*Build\*\*: ([^\n]+)/,
} as const;

// every matching block is rewritten, not just the first
const docBlocks = new RegExp(patterns.docBlock.source, "g");

// swap the quoted value while keeping whatever declaration surrounds it
const replaceQuoted = (
  content: string,
  pattern: RegExp,
  value: string,
): WriteResult => {
  if (!pattern.test(content)) {
    return { content, matched: false };
  }
  return {
    content: content.replace(
      pattern,
      (_match, head: string, _old: string, tail: string) =>
        `${head}${value}${tail}`,
    ),
    matched: true,
  };
};

/**
 * Source constants file, e.g.
 *
 *   pub const VERSION: &str = "0.2.6";
 *   pub const BUILD: &str = "0007";
 *
 * Any declaration of the form `VERSION: <type> = "…"` is accepted.
 */
export const constantsFile: VersionFile = {
  label: "constants file",
  readField: (content) => ({
    version: patterns.constantsVersion.exec(content)?.[2],
    build: patterns.constantsBuild.exec(content)?.[2],
  }),
  writeField: (content, { version, build }) => {
    const withVersion = replaceQuoted(
      content,
      patterns.constantsVersion,
      version,
    );
    const withBuild = replaceQuoted(
      withVersion.content,
      patterns.constantsBuild,
      build,
    );
    return {
      content: withBuild.content,
      matched: withVersion.matched && withBuild.matched,
    };
  },
};

// only the first `version = "…"` at the start of a line is touched
export const manifestFile: VersionFile = {
  label: "manifest",
  readField: (content) => ({
    version: patterns.manifestVersion.exec(content)?.[2],
  }),
  writeField: (content, { version }) =>
    replaceQuoted(content, patterns.manifestVersion, version),
};

export const docFile: VersionFile = {
  label: "version document",
  readField: (content) => {
    const match = patterns.docBlock.exec(content);
    return {
      version: match?.[1]?.trim(),
      build: match?.[2]?.trim(),
    };
  },
  writeField: (content, pair: VersionPair) => {
    if (!patterns.docBlock.test(content)) {
      return { content, matched: false };
    }
    return {
      content: content.replace(
        docBlocks,
        () =>
          `## Current Version\n\n- **Version**: ${pair.version}\n- **Build**: ${pair.build}`,
      ),
      matched: true,
    };
  },
};
