import fs from "fs-extra";
import os from "node:os";
import path from "pathe";

import type { ProjectPaths, VersionPair } from "../types.js";

export const versionRs = ({ version, build }: VersionPair): string =>
  `// Version and build tracking for demo
pub const VERSION: &str = "${version}";
pub const BUILD: &str = "${build}";

pub fn version_string() -> String {
    format!("v{}-{}", VERSION, BUILD)
}
`;

export const cargoToml = (version: string): string =>
  `[package]
name = "demo"
version = "${version}"
edition = "2021"

[dependencies]
serde = { version = "1.0", features = ["derive"] }
`;

export const versionMd = ({ version, build }: VersionPair): string =>
  `# Version Management

## Current Version

- **Version**: ${version}
- **Build**: ${build}

## Process

Run the bump before tagging a release.
`;

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "stampver-"));
}

/** Writes the three version-bearing files into `root`. */
export async function writeProject(
  root: string,
  pair: VersionPair,
): Promise<ProjectPaths> {
  const paths: ProjectPaths = {
    root,
    constantsFile: path.join(root, "src/version.rs"),
    manifestFile: path.join(root, "Cargo.toml"),
    docFile: path.join(root, "VERSION_MANAGEMENT.md"),
  };
  await fs.outputFile(paths.constantsFile, versionRs(pair));
  await fs.outputFile(paths.manifestFile, cargoToml(pair.version));
  await fs.outputFile(paths.docFile, versionMd(pair));
  return paths;
}
