/**
 * Tests for the forced-linkage mutation transaction
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { deriveTrampolines } from "./identifiers.js";
import {
  applyTrampolines,
  beginMutation,
  journalPath,
  recoverInterruptedRun,
  restoreMutation,
  snapshotDir,
  snapshotUnits,
  withForcedLinkage,
} from "./source-mutator.js";
import { containsTrampolineBlock } from "./trampoline.js";
import type { Trampoline } from "./types.js";

const UNIT_A = '#import "A.h"\n\n@implementation A (Extras)\n- (void)extra {}\n@end\n';
const UNIT_B = '#import "B.h"\n@implementation B\n@end'; // No trailing newline

const createProject = (): string => {
  const dir = mkdtempSync(join(tmpdir(), "archpack-mutator-"));
  mkdirSync(join(dir, "src"), { recursive: true });
  writeFileSync(join(dir, "src", "A+Extras.m"), UNIT_A, "utf-8");
  writeFileSync(join(dir, "src", "B.m"), UNIT_B, "utf-8");
  return dir;
};

const trampolinesFor = (paths: readonly string[]): readonly Trampoline[] => {
  const result = deriveTrampolines("mylib", paths);
  if (!result.ok) throw new Error(result.error);
  return result.value;
};

const read = (dir: string, rel: string): string => readFileSync(join(dir, rel), "utf-8");

const journaledPaths = (dir: string): readonly string[] => {
  const journal = JSON.parse(readFileSync(journalPath(dir), "utf-8")) as {
    entries: { path: string }[];
  };
  return journal.entries.map((e) => e.path);
};

describe("Source Mutator", () => {
  describe("withForcedLinkage", () => {
    it("should expose mutated units to the body and restore them afterwards", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/B.m"]);
        let seenDuringBody: readonly string[] = [];

        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => {
          seenDuringBody = [read(dir, "src/A+Extras.m"), read(dir, "src/B.m")];
          return { ok: true, value: 42 };
        });

        expect(result).to.deep.equal({ ok: true, value: 42 });
        expect(seenDuringBody.every(containsTrampolineBlock)).to.equal(true);
        expect(seenDuringBody[0]?.startsWith(UNIT_A)).to.equal(true);
        expect(seenDuringBody[1]?.startsWith(`${UNIT_B}\n`)).to.equal(true);
        expect(read(dir, "src/A+Extras.m")).to.equal(UNIT_A);
        expect(read(dir, "src/B.m")).to.equal(UNIT_B);
        expect(existsSync(snapshotDir(dir))).to.equal(false);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should restore units when the body fails", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/B.m"]);
        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => ({
          ok: false,
          error: "xcodebuild failed",
        }));

        expect(result).to.deep.equal({ ok: false, error: "xcodebuild failed" });
        expect(read(dir, "src/A+Extras.m")).to.equal(UNIT_A);
        expect(read(dir, "src/B.m")).to.equal(UNIT_B);
        expect(existsSync(journalPath(dir))).to.equal(false);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should leave the process's signal handling alone while the body runs", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/B.m"]);
        const before = ["SIGINT", "SIGTERM", "SIGHUP"].map((s) => process.listenerCount(s));
        let during: number[] = [];

        withForcedLinkage({ projectRoot: dir, trampolines }, () => {
          during = ["SIGINT", "SIGTERM", "SIGHUP"].map((s) => process.listenerCount(s));
          return { ok: true, value: undefined };
        });

        expect(during).to.deep.equal(before);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should report units it could not restore after a successful body", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/B.m"]);
        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => {
          // Damage every snapshot while the build runs.
          for (const f of readdirSync(snapshotDir(dir))) {
            if (f.endsWith(".snapshot")) writeFileSync(join(snapshotDir(dir), f), "damaged", "utf-8");
          }
          return { ok: true, value: undefined };
        });

        expect(result).to.deep.equal({
          ok: false,
          error:
            "Failed to restore forced-linkage files:\n" +
            `Checksum mismatch after restoring ${join(dir, "src", "A+Extras.m")}\n` +
            `Checksum mismatch after restoring ${join(dir, "src", "B.m")}`,
        });
        expect(journaledPaths(dir)).to.deep.equal([
          join(dir, "src", "A+Extras.m"),
          join(dir, "src", "B.m"),
        ]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should restore units when the body throws", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m"]);
        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => {
          throw new Error("boom");
        });

        expect(result).to.deep.equal({ ok: false, error: "boom" });
        expect(read(dir, "src/A+Extras.m")).to.equal(UNIT_A);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should not touch anything when a listed unit is missing", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/Missing.m"]);
        let ran = false;
        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => {
          ran = true;
          return { ok: true, value: undefined };
        });

        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error).to.equal(
            `Forced-linkage file not found: ${join(dir, "src", "Missing.m")}`
          );
        }
        expect(ran).to.equal(false);
        expect(read(dir, "src/A+Extras.m")).to.equal(UNIT_A);
        expect(existsSync(snapshotDir(dir))).to.equal(false);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should reject units that are not Objective-C", () => {
      const dir = createProject();
      try {
        writeFileSync(join(dir, "src", "util.c"), "int x;\n", "utf-8");
        const trampolines = trampolinesFor(["src/util.c"]);
        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => ({
          ok: true,
          value: undefined,
        }));
        expect(result.ok).to.equal(false);
        expect(read(dir, "src/util.c")).to.equal("int x;\n");
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should refuse a unit that already carries a trampoline block", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/B.m"]);
        const first = beginMutation(dir, trampolines);
        if (!first.ok) throw new Error(first.error);
        // Journal lost, mutated unit left behind.
        rmSync(snapshotDir(dir), { recursive: true, force: true });
        const mutated = read(dir, "src/B.m");

        const result = withForcedLinkage({ projectRoot: dir, trampolines }, () => ({
          ok: true,
          value: undefined,
        }));

        expect(result).to.deep.equal({
          ok: false,
          error: `Forced-linkage file already carries a trampoline block: ${join(dir, "src", "B.m")}. Restore it from version control.`,
        });
        expect(read(dir, "src/B.m")).to.equal(mutated);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe("recoverInterruptedRun", () => {
    it("should be a no-op without a journal", () => {
      const dir = createProject();
      try {
        const result = recoverInterruptedRun(dir);
        expect(result).to.deep.equal({ ok: true, value: { restored: [], discarded: [] } });
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should restore units left mutated by an interrupted run", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/B.m"]);
        // Simulate a crash: mutate and never restore.
        const begin = beginMutation(dir, trampolines);
        expect(begin.ok).to.equal(true);
        expect(containsTrampolineBlock(read(dir, "src/B.m"))).to.equal(true);

        const result = recoverInterruptedRun(dir);
        expect(result).to.deep.equal({
          ok: true,
          value: {
            restored: [join(dir, "src", "A+Extras.m"), join(dir, "src", "B.m")],
            discarded: [],
          },
        });
        expect(read(dir, "src/A+Extras.m")).to.equal(UNIT_A);
        expect(read(dir, "src/B.m")).to.equal(UNIT_B);
        expect(existsSync(journalPath(dir))).to.equal(false);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should discard entries whose unit is already back to its original", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/B.m"]);
        const begin = beginMutation(dir, trampolines);
        if (!begin.ok) throw new Error(begin.error);
        writeFileSync(join(dir, "src", "B.m"), UNIT_B, "utf-8");

        const result = recoverInterruptedRun(dir);
        expect(result).to.deep.equal({
          ok: true,
          value: { restored: [], discarded: [join(dir, "src", "B.m")] },
        });
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should fail when neither the unit nor its snapshot is intact", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/B.m"]);
        const begin = beginMutation(dir, trampolines);
        if (!begin.ok) throw new Error(begin.error);
        const entry = begin.value.entries[0];
        if (!entry) throw new Error("no journal entry");
        writeFileSync(entry.backup, "damaged", "utf-8");

        const result = recoverInterruptedRun(dir);
        expect(result.ok).to.equal(false);
        if (!result.ok) {
          expect(result.error).to.include(`Cannot recover ${join(dir, "src", "B.m")}`);
        }
        expect(existsSync(journalPath(dir))).to.equal(true);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe("beginMutation", () => {
    it("should refuse to start over an existing journal", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/B.m"]);
        const first = beginMutation(dir, trampolines);
        if (!first.ok) throw new Error(first.error);

        const second = beginMutation(dir, trampolines);
        expect(second).to.deep.equal({
          ok: false,
          error: `A mutation journal from an earlier run exists at ${journalPath(dir)}. Run 'archpack recover' first.`,
        });

        const restored = restoreMutation(first.value);
        expect(restored.ok).to.equal(true);
        expect(read(dir, "src/B.m")).to.equal(UNIT_B);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe("applyTrampolines", () => {
    it("should undo earlier appends when a later unit cannot be written", () => {
      const dir = createProject();
      try {
        writeFileSync(join(dir, "src", "C.m"), "@implementation C\n@end\n", "utf-8");
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/B.m", "src/C.m"]);
        const snapshot = snapshotUnits(dir, trampolines);
        if (!snapshot.ok) throw new Error(snapshot.error);
        const [, entryB, entryC] = snapshot.value.entries;
        if (!entryB || !entryC) throw new Error("missing journal entries");

        // B turns into a directory after it was validated and backed up.
        rmSync(join(dir, "src", "B.m"));
        mkdirSync(join(dir, "src", "B.m"));

        const result = applyTrampolines(snapshot.value);

        expect(result.ok).to.equal(false);
        if (!result.ok) {
          const lines = result.error.split("\n");
          expect(lines).to.have.length(2);
          expect(lines[0]?.startsWith(`Failed to mutate ${entryB.path}: `)).to.equal(true);
          expect(lines[1]?.startsWith(`Failed to restore ${entryB.path}: `)).to.equal(true);
        }
        expect(read(dir, "src/A+Extras.m")).to.equal(UNIT_A);
        expect(read(dir, "src/C.m")).to.equal("@implementation C\n@end\n");
        expect(existsSync(entryC.backup)).to.equal(false);
        // Only the unit that could not be put back stays journaled.
        expect(journaledPaths(dir)).to.deep.equal([entryB.path]);

        rmSync(join(dir, "src", "B.m"), { recursive: true });
        const recovered = recoverInterruptedRun(dir);
        expect(recovered).to.deep.equal({
          ok: true,
          value: { restored: [entryB.path], discarded: [] },
        });
        expect(read(dir, "src/B.m")).to.equal(UNIT_B);
        expect(existsSync(snapshotDir(dir))).to.equal(false);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe("restoreMutation", () => {
    it("should keep journaling a unit whose snapshot no longer matches", () => {
      const dir = createProject();
      try {
        const trampolines = trampolinesFor(["src/A+Extras.m", "src/B.m"]);
        const begin = beginMutation(dir, trampolines);
        if (!begin.ok) throw new Error(begin.error);
        const [entryA, entryB] = begin.value.entries;
        if (!entryA || !entryB) throw new Error("missing journal entries");
        writeFileSync(entryA.backup, "damaged", "utf-8");

        const result = restoreMutation(begin.value);

        expect(result).to.deep.equal({
          ok: false,
          error: `Checksum mismatch after restoring ${entryA.path}`,
        });
        expect(read(dir, "src/B.m")).to.equal(UNIT_B);
        expect(existsSync(entryB.backup)).to.equal(false);
        expect(existsSync(entryA.backup)).to.equal(true);
        expect(journaledPaths(dir)).to.deep.equal([entryA.path]);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should clear the journal once every unit is back", () => {
      const dir = createProject();
      try {
        const begin = beginMutation(dir, trampolinesFor(["src/A+Extras.m", "src/B.m"]));
        if (!begin.ok) throw new Error(begin.error);

        expect(restoreMutation(begin.value)).to.deep.equal({
          ok: true,
          value: [join(dir, "src", "A+Extras.m"), join(dir, "src", "B.m")],
        });
        expect(existsSync(snapshotDir(dir))).to.equal(false);
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
