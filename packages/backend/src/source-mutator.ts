/**
 * Forced-linkage source mutation as a journaled transaction.
 *
 * snapshot -> append trampolines -> external build -> restore
 *
 * Every unit is backed up under `.archpack/snapshots/` (keyed by the sha256 of
 * its absolute path) and recorded in `journal.json` with the checksum of its
 * original bytes. The journal outlives an interrupted process so the next run
 * can put the units back before doing anything else.
 */

import { createHash } from "node:crypto";
import {
  accessSync,
  appendFileSync,
  constants,
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { extname, join, resolve } from "node:path";
import type { Result, Trampoline } from "./types.js";
import { containsTrampolineBlock, trampolineSuffix } from "./trampoline.js";

export const FORCE_LINK_EXTENSIONS: readonly string[] = [".m", ".mm"];

export type JournalEntry = {
  readonly path: string; // Absolute
  readonly backup: string; // Absolute
  readonly checksum: string; // sha256 of the original bytes
  readonly identifier: string;
};

export type MutationTransaction = {
  readonly projectRoot: string;
  readonly entries: readonly JournalEntry[];
};

export type RecoveryReport = {
  readonly restored: readonly string[];
  readonly discarded: readonly string[];
};

export const snapshotDir = (projectRoot: string): string =>
  join(projectRoot, ".archpack", "snapshots");

export const journalPath = (projectRoot: string): string =>
  join(snapshotDir(projectRoot), "journal.json");

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const sha256 = (data: Uint8Array | string): string =>
  createHash("sha256").update(data).digest("hex");

const fileChecksum = (path: string): string =>
  sha256(new Uint8Array(readFileSync(path)));

const isJournalEntry = (value: unknown): value is JournalEntry => {
  if (typeof value !== "object" || value === null) return false;
  const entry = value as Record<string, unknown>;
  return (
    typeof entry.path === "string" &&
    typeof entry.backup === "string" &&
    typeof entry.checksum === "string" &&
    typeof entry.identifier === "string"
  );
};

const readJournal = (
  projectRoot: string
): Result<readonly JournalEntry[], string> => {
  const path = journalPath(projectRoot);
  try {
    const parsed = JSON.parse(readFileSync(path, "utf-8")) as {
      entries?: unknown;
    };
    const entries = Array.isArray(parsed.entries) ? parsed.entries : [];
    if (!entries.every(isJournalEntry)) {
      return { ok: false, error: `Malformed mutation journal: ${path}` };
    }
    return { ok: true, value: entries };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to read mutation journal ${path}: ${errorMessage(error)}`,
    };
  }
};

const writeJournal = (
  projectRoot: string,
  entries: readonly JournalEntry[]
): void => {
  writeFileSync(
    journalPath(projectRoot),
    JSON.stringify({ entries }, null, 2) + "\n",
    "utf-8"
  );
};

/**
 * Remove the journal and, when nothing else is left in it, the snapshot dir
 */
const clearJournal = (projectRoot: string): void => {
  rmSync(journalPath(projectRoot), { force: true });
  const dir = snapshotDir(projectRoot);
  if (existsSync(dir) && readdirSync(dir).length === 0) {
    rmSync(dir, { recursive: true, force: true });
  }
};

/**
 * Every unit must exist, be an Objective-C file, be writable and not carry a
 * trampoline block already
 */
export const validateUnits = (
  projectRoot: string,
  trampolines: readonly Trampoline[]
): Result<void, string> => {
  for (const { unitPath } of trampolines) {
    const absolute = resolve(projectRoot, unitPath);
    if (!existsSync(absolute) || !statSync(absolute).isFile()) {
      return { ok: false, error: `Forced-linkage file not found: ${absolute}` };
    }
    if (!FORCE_LINK_EXTENSIONS.includes(extname(absolute).toLowerCase())) {
      return {
        ok: false,
        error: `Forced-linkage file must be Objective-C (${FORCE_LINK_EXTENSIONS.join(", ")}): ${absolute}`,
      };
    }
    try {
      accessSync(absolute, constants.R_OK | constants.W_OK);
    } catch {
      return { ok: false, error: `Forced-linkage file is not writable: ${absolute}` };
    }
    if (containsTrampolineBlock(readFileSync(absolute, "utf-8"))) {
      return {
        ok: false,
        error: `Forced-linkage file already carries a trampoline block: ${absolute}. Restore it from version control.`,
      };
    }
  }
  return { ok: true, value: undefined };
};

/**
 * Copy each backup over its unit and verify the bytes. Failures for single
 * units are collected; entries that could not be restored are returned.
 */
const restoreEntries = (
  entries: readonly JournalEntry[]
): { readonly failed: readonly JournalEntry[]; readonly errors: readonly string[] } => {
  const failed: JournalEntry[] = [];
  const errors: string[] = [];

  for (const entry of entries) {
    try {
      copyFileSync(entry.backup, entry.path);
      if (fileChecksum(entry.path) !== entry.checksum) {
        failed.push(entry);
        errors.push(`Checksum mismatch after restoring ${entry.path}`);
        continue;
      }
      rmSync(entry.backup, { force: true });
    } catch (error) {
      failed.push(entry);
      errors.push(`Failed to restore ${entry.path}: ${errorMessage(error)}`);
    }
  }

  return { failed, errors };
};

/**
 * Back up every unit and write the journal. Nothing is touched unless every
 * unit validates.
 */
export const snapshotUnits = (
  projectRoot: string,
  trampolines: readonly Trampoline[]
): Result<MutationTransaction, string> => {
  if (existsSync(journalPath(projectRoot))) {
    return {
      ok: false,
      error: `A mutation journal from an earlier run exists at ${journalPath(projectRoot)}. Run 'archpack recover' first.`,
    };
  }

  const validation = validateUnits(projectRoot, trampolines);
  if (!validation.ok) return validation;

  const dir = snapshotDir(projectRoot);
  const entries: JournalEntry[] = [];

  try {
    mkdirSync(dir, { recursive: true });
    for (const { unitPath, identifier } of trampolines) {
      const path = resolve(projectRoot, unitPath);
      const backup = join(dir, `${sha256(path)}.snapshot`);
      copyFileSync(path, backup);
      entries.push({ path, backup, checksum: fileChecksum(path), identifier });
    }
    writeJournal(projectRoot, entries);
  } catch (error) {
    for (const entry of entries) rmSync(entry.backup, { force: true });
    clearJournal(projectRoot);
    return {
      ok: false,
      error: `Failed to snapshot forced-linkage files: ${errorMessage(error)}`,
    };
  }

  return { ok: true, value: { projectRoot, entries } };
};

/**
 * Append each unit's trampoline. A failure part-way restores the units
 * already written; the journal is left holding only the units that could
 * not be put back.
 */
export const applyTrampolines = (
  tx: MutationTransaction
): Result<MutationTransaction, string> => {
  const { projectRoot, entries } = tx;

  for (const [index, entry] of entries.entries()) {
    try {
      const original = readFileSync(entry.path, "utf-8");
      appendFileSync(entry.path, trampolineSuffix(original, entry.identifier), "utf-8");
    } catch (error) {
      // The unit being written may be partially appended: include it.
      const { failed, errors } = restoreEntries(entries.slice(0, index + 1));
      for (const rest of entries.slice(index + 1)) {
        rmSync(rest.backup, { force: true });
      }
      if (failed.length > 0) {
        writeJournal(projectRoot, failed);
      } else {
        clearJournal(projectRoot);
      }
      return {
        ok: false,
        error: [
          `Failed to mutate ${entry.path}: ${errorMessage(error)}`,
          ...errors,
        ].join("\n"),
      };
    }
  }

  return { ok: true, value: tx };
};

/**
 * Snapshot every unit, then append its trampoline. All-or-nothing.
 */
export const beginMutation = (
  projectRoot: string,
  trampolines: readonly Trampoline[]
): Result<MutationTransaction, string> => {
  const snapshot = snapshotUnits(projectRoot, trampolines);
  if (!snapshot.ok) return snapshot;
  return applyTrampolines(snapshot.value);
};

/**
 * Put every unit of a transaction back. The journal is kept when any unit
 * could not be restored so `recoverInterruptedRun` can retry.
 */
export const restoreMutation = (
  tx: MutationTransaction
): Result<readonly string[], string> => {
  const { failed, errors } = restoreEntries(tx.entries);
  if (failed.length > 0) {
    writeJournal(tx.projectRoot, failed);
    return { ok: false, error: errors.join("\n") };
  }
  clearJournal(tx.projectRoot);
  return { ok: true, value: tx.entries.map((e) => e.path) };
};

export type ForcedLinkageOptions = {
  readonly projectRoot: string;
  readonly trampolines: readonly Trampoline[];
};

/**
 * Run `body` while the units carry their trampolines. The units are restored
 * whether `body` returns or throws; a restore failure is reported even when
 * `body` succeeded, and appended to the body's error when it did not.
 *
 * No signal handlers are installed: `body` blocks in spawnSync, so a handler
 * could not run before it returns. A signal that kills this process leaves
 * the journal behind for `recoverInterruptedRun`; a signal that kills the
 * external tool comes back as a failed result and is restored here.
 */
export const withForcedLinkage = <T>(
  options: ForcedLinkageOptions,
  body: () => Result<T, string>
): Result<T, string> => {
  const begin = beginMutation(options.projectRoot, options.trampolines);
  if (!begin.ok) return begin;
  const tx = begin.value;

  let outcome: Result<T, string>;
  try {
    outcome = body();
  } catch (error) {
    outcome = { ok: false, error: errorMessage(error) };
  }

  const restore = restoreMutation(tx);
  if (!restore.ok) {
    return {
      ok: false,
      error: outcome.ok
        ? `Failed to restore forced-linkage files:\n${restore.error}`
        : `${outcome.error}\nFailed to restore forced-linkage files:\n${restore.error}`,
    };
  }
  return outcome;
};

/**
 * Pre-run check: undo whatever an interrupted run left behind.
 *
 * A unit is restored from its backup when the backup still matches the
 * recorded checksum. When the backup is missing or damaged but the unit
 * already has its original bytes, the entry is discarded. Anything else is
 * unrecoverable and fails naming the unit.
 */
export const recoverInterruptedRun = (
  projectRoot: string
): Result<RecoveryReport, string> => {
  if (!existsSync(journalPath(projectRoot))) {
    return { ok: true, value: { restored: [], discarded: [] } };
  }

  const journal = readJournal(projectRoot);
  if (!journal.ok) return journal;

  const restored: string[] = [];
  const discarded: string[] = [];
  const pending: JournalEntry[] = [];

  for (const entry of journal.value) {
    const backupIntact =
      existsSync(entry.backup) && fileChecksum(entry.backup) === entry.checksum;
    const unitIntact =
      existsSync(entry.path) && fileChecksum(entry.path) === entry.checksum;

    if (unitIntact) {
      rmSync(entry.backup, { force: true });
      discarded.push(entry.path);
    } else if (backupIntact) {
      pending.push(entry);
    } else {
      return {
        ok: false,
        error:
          `Cannot recover ${entry.path}: its snapshot ${entry.backup} is missing or damaged ` +
          `and the file differs from its original content. Restore it from version control, ` +
          `then delete ${journalPath(projectRoot)}.`,
      };
    }
  }

  const { failed, errors } = restoreEntries(pending);
  if (failed.length > 0) {
    writeJournal(projectRoot, failed);
    return { ok: false, error: errors.join("\n") };
  }
  restored.push(...pending.map((e) => e.path));

  clearJournal(projectRoot);
  return { ok: true, value: { restored, discarded } };
};
