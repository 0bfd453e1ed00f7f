/**
 * Tests for the sync command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  lstatSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readlinkSync,
  rmSync,
  symlinkSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveSyncSettings } from "../config.js";
import { syncCommand } from "./sync.js";

type Fixture = { readonly workspace: string; readonly repo: string };

const withFixture = (fn: (f: Fixture) => void): void => {
  const dir = mkdtempSync(join(tmpdir(), "archpack-sync-cmd-"));
  try {
    const workspace = join(dir, "app");
    const repo = join(dir, "repo");
    mkdirSync(workspace, { recursive: true });
    mkdirSync(join(repo, "alpha-1.0-Release"), { recursive: true });
    mkdirSync(join(repo, "alpha-1.0-Debug"), { recursive: true });
    mkdirSync(join(repo, "beta-Release"), { recursive: true });
    fn({ workspace, repo });
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
};

const settingsFor = (f: Fixture, strict = false, configuration?: string) =>
  resolveSyncSettings(
    undefined,
    { repository: f.repo, quiet: true, strict, configuration },
    f.workspace,
    {}
  );

describe("sync command", () => {
  it("should link every declared package that resolves", () => {
    withFixture((f) => {
      writeFileSync(
        join(f.workspace, "archpack-deps.txt"),
        "# dependencies\nalpha 1.0\nbeta\ngamma@2.0\n",
        "utf-8"
      );

      const result = syncCommand(settingsFor(f));

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.linked).to.deep.equal(["alpha", "beta"]);
      expect(result.value.missing).to.deep.equal([
        {
          dependency: { name: "gamma", version: "2.0" },
          expected: join(f.repo, "gamma-2.0-Release"),
        },
      ]);
      const refs = join(f.workspace, "archpack_packages");
      expect(readdirSync(refs).sort()).to.deep.equal(["alpha", "beta"]);
      expect(readlinkSync(join(refs, "alpha"))).to.equal(join(f.repo, "alpha-1.0-Release"));
    });
  });

  it("should link the requested configuration", () => {
    withFixture((f) => {
      writeFileSync(join(f.workspace, "archpack-deps.txt"), "alpha 1.0\n", "utf-8");

      const result = syncCommand(settingsFor(f, false, "Debug"));

      expect(result.ok).to.equal(true);
      expect(readlinkSync(join(f.workspace, "archpack_packages", "alpha"))).to.equal(
        join(f.repo, "alpha-1.0-Debug")
      );
    });
  });

  it("should fail on a missing package in strict mode", () => {
    withFixture((f) => {
      writeFileSync(join(f.workspace, "archpack-deps.txt"), "alpha 1.0\ngamma\n", "utf-8");

      const result = syncCommand(settingsFor(f, true));

      expect(result).to.deep.equal({
        ok: false,
        error: `Package not found for 'gamma': ${join(f.repo, "gamma-Release")}`,
      });
      // Resolvable declarations are still linked.
      expect(lstatSync(join(f.workspace, "archpack_packages", "alpha")).isSymbolicLink()).to.equal(
        true
      );
    });
  });

  it("should remove every link when there is no dependency list", () => {
    withFixture((f) => {
      const refs = join(f.workspace, "archpack_packages");
      mkdirSync(refs);
      symlinkSync(join(f.repo, "beta-Release"), join(refs, "beta"), "dir");

      const result = syncCommand(settingsFor(f));

      expect(result.ok).to.equal(true);
      if (result.ok) expect(result.value.removed).to.deep.equal(["beta"]);
      expect(readdirSync(refs)).to.deep.equal([]);
    });
  });

  it("should name the dependency list in parse errors", () => {
    withFixture((f) => {
      const deps = join(f.workspace, "archpack-deps.txt");
      writeFileSync(deps, "alpha\nalpha 1.0\n", "utf-8");

      const result = syncCommand(settingsFor(f));

      expect(result).to.deep.equal({
        ok: false,
        error: `${deps}: Line 2: 'alpha' is already declared on line 1`,
      });
    });
  });
});
