import { relinka } from "@reliverse/relinka";
import fs from "fs-extra";

import type {
  BumpOptions,
  FileCheck,
  ProjectPaths,
  VersionFile,
  VersionPair,
  VersionTriple,
} from "./types.js";

import { ParseError, errorMessage } from "./errors.js";
import { constantsFile, docFile, manifestFile } from "./files.js";
import {
  INITIAL_BUILD,
  bumpVersion,
  parseVersion,
  validateCustomVersion,
  versionString,
} from "./version.js";

/**
 * Reads a file and logs the failure before rethrowing it.
 */
async function readFileSafe(filePath: string, reason: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    relinka(
      "verbose",
      `Failed to read file: ${filePath} [Reason: ${reason}] ${errorMessage(error)}`,
    );
    throw error;
  }
}

async function writeFileSafe(
  filePath: string,
  content: string,
  reason: string,
): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf8");
    relinka(
      "verbose",
      `Successfully wrote file: ${filePath} [Reason: ${reason}]`,
    );
  } catch (error) {
    relinka(
      "verbose",
      `Failed to write file: ${filePath} [Reason: ${reason}] ${errorMessage(error)}`,
    );
    throw error;
  }
}

export const NEXT_STEPS = (version: string): string[] => [
  "1. Review changes: git diff",
  "2. Rebuild: cargo build",
  `3. Commit: git add -A && git commit -m 'chore: bump version to ${version}'`,
  "4. Push: git push origin main",
];

/**
 * Keeps the version/build pair in sync across the constants file, the
 * manifest and the version document. The constants file is the source of
 * truth and is re-read on every call.
 */
export class VersionManager {
  private readonly dryRun: boolean;

  constructor(
    readonly paths: ProjectPaths,
    options: BumpOptions = {},
  ) {
    this.dryRun = !!options.dryRun;
  }

  async getCurrentVersion(): Promise<VersionPair> {
    const content = await readFileSafe(
      this.paths.constantsFile,
      "read current version",
    );
    const { version, build } = constantsFile.readField(content);
    if (!version || !build) {
      throw new ParseError(
        `Could not parse version from ${this.paths.constantsFile}`,
      );
    }
    return { version, build };
  }

  parseVersion(version: string): VersionTriple {
    return parseVersion(version);
  }

  async bumpVersion(bumpType: string): Promise<VersionPair> {
    return bumpVersion(await this.getCurrentVersion(), bumpType);
  }

  async updateVersionRs(version: string, build: string): Promise<void> {
    const matched = await this.rewrite(
      this.paths.constantsFile,
      constantsFile,
      { version, build },
    );
    if (!matched) {
      throw new ParseError(
        `Could not parse version from ${this.paths.constantsFile}`,
      );
    }
  }

  async updateCargoToml(version: string): Promise<void> {
    // the manifest carries no build counter
    const matched = await this.rewrite(this.paths.manifestFile, manifestFile, {
      version,
      build: "",
    });
    if (!matched) {
      relinka(
        "warn",
        `No line starting with version = "…" in ${this.paths.manifestFile}`,
      );
    }
  }

  // a missing "## Current Version" block leaves the file as it was
  async updateVersionMd(version: string, build: string): Promise<void> {
    const matched = await this.rewrite(this.paths.docFile, docFile, {
      version,
      build,
    });
    if (!matched) {
      relinka(
        "warn",
        `No "## Current Version" block in ${this.paths.docFile}, content unchanged`,
      );
    }
  }

  async bump(bumpType: string): Promise<VersionPair> {
    const current = await this.getCurrentVersion();
    const next = bumpVersion(current, bumpType);
    await this.apply(`Version Bump: ${bumpType}`, current, next);
    return next;
  }

  /**
   * Sets an explicit version; the build counter starts over.
   */
  async set(version: string): Promise<VersionPair> {
    const current = await this.getCurrentVersion();
    const next = { version: validateCustomVersion(version), build: INITIAL_BUILD };
    await this.apply(`Version Set: ${next.version}`, current, next);
    return next;
  }

  async show(): Promise<VersionPair> {
    const current = await this.getCurrentVersion();
    relinka("log", "📦 Current Version");
    relinka("log", `   Version: ${current.version}`);
    relinka("log", `   Build: ${current.build}`);
    relinka("log", `   Full: ${versionString(current)}`);
    return current;
  }

  /**
   * Compares every artifact against the constants file.
   */
  async check(): Promise<FileCheck[]> {
    const current = await this.getCurrentVersion();
    const results: FileCheck[] = [
      {
        file: this.paths.constantsFile,
        label: constantsFile.label,
        detectedVersion: current.version,
        versionMismatch: false,
        reason: "ok",
      },
    ];

    const targets: [string, VersionFile][] = [
      [this.paths.manifestFile, manifestFile],
      [this.paths.docFile, docFile],
    ];
    for (const [file, target] of targets) {
      if (!(await fs.pathExists(file))) {
        results.push({
          file,
          label: target.label,
          detectedVersion: null,
          versionMismatch: false,
          reason: "file not found",
        });
        continue;
      }
      const found = target.readField(await readFileSafe(file, "check"));
      results.push(compareFields(file, target.label, found, current));
    }

    for (const result of results) {
      const level =
        result.detectedVersion === null || result.versionMismatch
          ? "warn"
          : "log";
      relinka(level, `${result.label}: ${result.reason} (${result.file})`);
    }
    return results;
  }

  private async apply(
    title: string,
    current: VersionPair,
    next: VersionPair,
  ): Promise<void> {
    relinka("log", `📦 ${title}${this.dryRun ? " [dry run]" : ""}`);
    relinka("log", `   Old: ${versionString(current)}`);
    relinka("log", `   New: ${versionString(next)}`);

    await this.updateVersionRs(next.version, next.build);

    // a build-only bump leaves the manifest alone
    if (next.version !== current.version) {
      await this.updateCargoToml(next.version);
    }

    await this.updateVersionMd(next.version, next.build);

    if (this.dryRun) {
      relinka("success", "Dry run complete, no files were written");
      return;
    }
    relinka("success", "Version bumped successfully!");
    relinka("log", "Next steps:");
    for (const step of NEXT_STEPS(next.version)) {
      relinka("log", step);
    }
  }

  private async rewrite(
    filePath: string,
    target: VersionFile,
    pair: VersionPair,
  ): Promise<boolean> {
    const content = await readFileSafe(filePath, `update ${target.label}`);
    const { content: updated, matched } = target.writeField(content, pair);

    if (this.dryRun) {
      relinka("log", `[dry run] Would update ${filePath}`);
      return matched;
    }
    await writeFileSafe(filePath, updated, `update ${target.label}`);
    relinka("success", `Updated ${filePath}`);
    return matched;
  }
}

const compareFields = (
  file: string,
  label: string,
  found: Partial<VersionPair>,
  expected: VersionPair,
): FileCheck => {
  if (!found.version) {
    return {
      file,
      label,
      detectedVersion: null,
      versionMismatch: false,
      reason: "no version field found",
    };
  }
  if (found.version !== expected.version) {
    return {
      file,
      label,
      detectedVersion: found.version,
      versionMismatch: true,
      reason: `version mismatch: found ${found.version}, expected ${expected.version}`,
    };
  }
  if (found.build !== undefined && found.build !== expected.build) {
    return {
      file,
      label,
      detectedVersion: found.version,
      versionMismatch: true,
      reason: `build mismatch: found ${found.build}, expected ${expected.build}`,
    };
  }
  return {
    file,
    label,
    detectedVersion: found.version,
    versionMismatch: false,
    reason: "ok",
  };
};
