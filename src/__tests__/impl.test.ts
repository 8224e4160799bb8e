import { relinka } from "@reliverse/relinka";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ProjectPaths } from "../types.js";

import { InvalidArgumentError, ParseError } from "../errors.js";
import { VersionManager } from "../impl.js";
import {
  cargoToml,
  makeTempDir,
  versionMd,
  versionRs,
  writeProject,
} from "./fixtures.js";

vi.mock("@reliverse/relinka", () => ({ relinka: vi.fn() }));

const read = (file: string): Promise<string> => fs.readFile(file, "utf8");

describe("VersionManager", () => {
  let tmpDir: string;
  let paths: ProjectPaths;

  beforeEach(async () => {
    tmpDir = await makeTempDir();
    paths = await writeProject(tmpDir, { version: "0.2.6", build: "0007" });
  });

  afterEach(async () => {
    vi.mocked(relinka).mockClear();
    await fs.remove(tmpDir);
  });

  describe("getCurrentVersion()", () => {
    it("reads the pair from the constants file", async () => {
      const manager = new VersionManager(paths);
      await expect(manager.getCurrentVersion()).resolves.toEqual({
        version: "0.2.6",
        build: "0007",
      });
    });

    it("throws ParseError when a declaration is missing", async () => {
      await fs.writeFile(paths.constantsFile, 'pub const VERSION: &str = "0.2.6";\n');
      const manager = new VersionManager(paths);
      await expect(manager.getCurrentVersion()).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe("parseVersion() / bumpVersion()", () => {
    it("parses through the pure helper", () => {
      const manager = new VersionManager(paths);
      expect(manager.parseVersion("0.2.6")).toEqual([0n, 2n, 6n]);
    });

    it("computes the next pair without writing", async () => {
      const manager = new VersionManager(paths);
      await expect(manager.bumpVersion("minor")).resolves.toEqual({
        version: "0.3.0",
        build: "0001",
      });
      expect(await read(paths.constantsFile)).toBe(
        versionRs({ version: "0.2.6", build: "0007" }),
      );
    });
  });

  describe("bump()", () => {
    it("bumps patch across all three files", async () => {
      const manager = new VersionManager(paths);
      const next = await manager.bump("patch");

      expect(next).toEqual({ version: "0.2.7", build: "0001" });
      expect(await read(paths.constantsFile)).toBe(
        versionRs({ version: "0.2.7", build: "0001" }),
      );
      expect(await read(paths.manifestFile)).toBe(cargoToml("0.2.7"));
      expect(await read(paths.docFile)).toBe(
        versionMd({ version: "0.2.7", build: "0001" }),
      );
    });

    it("leaves the manifest untouched on a build bump", async () => {
      const manager = new VersionManager(paths);
      const next = await manager.bump("build");

      expect(next).toEqual({ version: "0.2.6", build: "0008" });
      expect(await read(paths.manifestFile)).toBe(cargoToml("0.2.6"));
      expect(await read(paths.constantsFile)).toBe(
        versionRs({ version: "0.2.6", build: "0008" }),
      );
      expect(relinka).not.toHaveBeenCalledWith(
        "success",
        `Updated ${paths.manifestFile}`,
      );
    });

    it.each([
      ["major", "1.0.0"],
      ["minor", "0.3.0"],
      ["patch", "0.2.7"],
    ])("updates the manifest on a %s bump", async (type, expected) => {
      const manager = new VersionManager(paths);
      await manager.bump(type);
      expect(await read(paths.manifestFile)).toBe(cargoToml(expected));
    });

    it("bumps major from 1.9.9 to 2.0.0", async () => {
      await writeProject(tmpDir, { version: "1.9.9", build: "0042" });
      const manager = new VersionManager(paths);

      await expect(manager.bump("major")).resolves.toEqual({
        version: "2.0.0",
        build: "0001",
      });
      expect(await read(paths.manifestFile)).toBe(cargoToml("2.0.0"));
    });

    it("prints the summary, per-file lines and next steps", async () => {
      const manager = new VersionManager(paths);
      await manager.bump("patch");

      const log = vi.mocked(relinka);
      expect(log).toHaveBeenCalledWith("log", "📦 Version Bump: patch");
      expect(log).toHaveBeenCalledWith("log", "   Old: v0.2.6-0007");
      expect(log).toHaveBeenCalledWith("log", "   New: v0.2.7-0001");
      expect(log).toHaveBeenCalledWith("success", `Updated ${paths.constantsFile}`);
      expect(log).toHaveBeenCalledWith("success", `Updated ${paths.manifestFile}`);
      expect(log).toHaveBeenCalledWith("success", `Updated ${paths.docFile}`);
      expect(log).toHaveBeenCalledWith("success", "Version bumped successfully!");
      expect(log).toHaveBeenCalledWith(
        "log",
        "3. Commit: git add -A && git commit -m 'chore: bump version to 0.2.7'",
      );
      expect(log).toHaveBeenCalledWith("log", "4. Push: git push origin main");
    });

    it("rejects an unknown bump type without writing", async () => {
      const manager = new VersionManager(paths);
      await expect(manager.bump("huge")).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
      expect(await read(paths.constantsFile)).toBe(
        versionRs({ version: "0.2.6", build: "0007" }),
      );
    });

    it("keeps earlier writes when a later file fails", async () => {
      await fs.remove(paths.docFile);
      const manager = new VersionManager(paths);

      await expect(manager.bump("patch")).rejects.toThrow();
      expect(await read(paths.constantsFile)).toBe(
        versionRs({ version: "0.2.7", build: "0001" }),
      );
      expect(await read(paths.manifestFile)).toBe(cargoToml("0.2.7"));
    });

    it("reports success but leaves the document unchanged when its block is missing", async () => {
      const doc = "# Versions\n\nNo block here.\n";
      await fs.writeFile(paths.docFile, doc);
      const manager = new VersionManager(paths);

      await manager.bump("patch");

      expect(await read(paths.docFile)).toBe(doc);
      expect(relinka).toHaveBeenCalledWith("success", `Updated ${paths.docFile}`);
      expect(relinka).toHaveBeenCalledWith(
        "warn",
        `No "## Current Version" block in ${paths.docFile}, content unchanged`,
      );
      expect(relinka).toHaveBeenCalledWith("success", "Version bumped successfully!");
    });

    it("writes nothing in dry-run mode", async () => {
      const manager = new VersionManager(paths, { dryRun: true });
      const next = await manager.bump("minor");

      expect(next).toEqual({ version: "0.3.0", build: "0001" });
      expect(await read(paths.constantsFile)).toBe(
        versionRs({ version: "0.2.6", build: "0007" }),
      );
      expect(await read(paths.manifestFile)).toBe(cargoToml("0.2.6"));
      expect(await read(paths.docFile)).toBe(
        versionMd({ version: "0.2.6", build: "0007" }),
      );
      expect(relinka).toHaveBeenCalledWith(
        "log",
        `[dry run] Would update ${paths.manifestFile}`,
      );
    });
  });

  describe("set()", () => {
    it("sets an explicit version and restarts the build", async () => {
      const manager = new VersionManager(paths);
      await expect(manager.set("1.4.0")).resolves.toEqual({
        version: "1.4.0",
        build: "0001",
      });
      expect(await read(paths.manifestFile)).toBe(cargoToml("1.4.0"));
      expect(relinka).toHaveBeenCalledWith("log", "📦 Version Set: 1.4.0");
    });

    it("rejects a prerelease version", async () => {
      const manager = new VersionManager(paths);
      await expect(manager.set("1.4.0-rc.1")).rejects.toBeInstanceOf(
        InvalidArgumentError,
      );
      expect(await read(paths.manifestFile)).toBe(cargoToml("0.2.6"));
    });
  });

  describe("show()", () => {
    it("prints the current pair without writing", async () => {
      const manager = new VersionManager(paths);
      await manager.show();

      expect(relinka).toHaveBeenCalledWith("log", "   Version: 0.2.6");
      expect(relinka).toHaveBeenCalledWith("log", "   Build: 0007");
      expect(relinka).toHaveBeenCalledWith("log", "   Full: v0.2.6-0007");
    });

    it("throws ParseError on unparsable content", async () => {
      await fs.writeFile(paths.constantsFile, "fn main() {}\n");
      const manager = new VersionManager(paths);
      await expect(manager.show()).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe("check()", () => {
    it("reports every file as ok when in sync", async () => {
      const manager = new VersionManager(paths);
      const results = await manager.check();
      expect(results.map((r) => r.reason)).toEqual(["ok", "ok", "ok"]);
    });

    it("flags a manifest that disagrees", async () => {
      await fs.writeFile(paths.manifestFile, cargoToml("0.2.5"));
      const manager = new VersionManager(paths);
      const results = await manager.check();

      expect(results[1]).toEqual({
        file: paths.manifestFile,
        label: "manifest",
        detectedVersion: "0.2.5",
        versionMismatch: true,
        reason: "version mismatch: found 0.2.5, expected 0.2.6",
      });
    });

    it("flags a stale build number in the document", async () => {
      await fs.writeFile(
        paths.docFile,
        versionMd({ version: "0.2.6", build: "0006" }),
      );
      const manager = new VersionManager(paths);
      const results = await manager.check();

      expect(results[2]?.reason).toBe(
        "build mismatch: found 0006, expected 0007",
      );
    });

    it("flags a missing document", async () => {
      await fs.remove(paths.docFile);
      const manager = new VersionManager(paths);
      const results = await manager.check();

      expect(results[2]).toMatchObject({
        detectedVersion: null,
        reason: "file not found",
      });
    });
  });
});
