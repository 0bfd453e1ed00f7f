/**
 * Consumer-side reference sync.
 *
 * Each declared (name, version) is resolved by exact directory name inside
 * the repository and exposed as `<workspace>/archpack_packages/<name>`, a
 * symbolic link to the package. Links for anything not resolved in this run
 * are removed, so repeated runs converge on the declared set. Entries in the
 * reference directory that are not symbolic links are never touched.
 */

import {
  existsSync,
  lstatSync,
  readdirSync,
  readlinkSync,
  statSync,
  symlinkSync,
  unlinkSync,
} from "node:fs";
import { dirname, join, resolve } from "node:path";
import { PACKAGE_COMPONENT, packageDirectoryName } from "./identifiers.js";
import { ensureWritableDirectory } from "./repository.js";
import type { DependencyDeclaration, Result } from "./types.js";

export const REFERENCE_DIR = "archpack_packages";

export type SyncOptions = {
  readonly workspaceRoot: string;
  readonly repositoryRoot: string;
  readonly dependencies: readonly DependencyDeclaration[];
  readonly configuration: string;
  readonly strict?: boolean;
};

export type UnresolvedDependency = {
  readonly dependency: DependencyDeclaration;
  readonly expected: string; // Absolute path that was looked up
};

export type SyncReport = {
  readonly referenceDir: string;
  readonly linked: readonly string[]; // Created or re-pointed
  readonly unchanged: readonly string[];
  readonly removed: readonly string[];
  readonly missing: readonly UnresolvedDependency[];
  readonly blocked: readonly string[]; // Names occupied by a non-link entry
};

export const referenceDir = (workspaceRoot: string): string =>
  join(workspaceRoot, REFERENCE_DIR);

export const describeDependency = (dependency: DependencyDeclaration): string =>
  dependency.version ? `${dependency.name} ${dependency.version}` : dependency.name;

const isSymlink = (path: string): boolean => {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
};

const occupied = (path: string): boolean => {
  try {
    lstatSync(path);
    return true;
  } catch {
    return false;
  }
};

/**
 * Make `linkPath` a link to `target`. Returns whether anything changed.
 */
const ensureLink = (linkPath: string, target: string): boolean => {
  if (isSymlink(linkPath)) {
    if (resolve(dirname(linkPath), readlinkSync(linkPath)) === target) return false;
    unlinkSync(linkPath);
  }
  symlinkSync(target, linkPath, "dir");
  return true;
};

export const syncReferences = (options: SyncOptions): Result<SyncReport, string> => {
  const { workspaceRoot, dependencies, configuration } = options;
  const repositoryRoot = resolve(options.repositoryRoot);

  if (!PACKAGE_COMPONENT.test(configuration)) {
    return { ok: false, error: `Invalid configuration '${configuration}'` };
  }

  const dirResult = ensureWritableDirectory(referenceDir(workspaceRoot), "Reference directory");
  if (!dirResult.ok) return dirResult;
  const refDir = dirResult.value;

  const linked: string[] = [];
  const unchanged: string[] = [];
  const removed: string[] = [];
  const missing: UnresolvedDependency[] = [];
  const blocked: string[] = [];
  const resolved = new Set<string>();

  try {
    for (const dependency of dependencies) {
      const expected = join(
        repositoryRoot,
        packageDirectoryName({ ...dependency, configuration })
      );
      if (!existsSync(expected) || !statSync(expected).isDirectory()) {
        missing.push({ dependency, expected });
        continue;
      }

      const linkPath = join(refDir, dependency.name);
      if (occupied(linkPath) && !isSymlink(linkPath)) {
        blocked.push(dependency.name);
        continue;
      }

      resolved.add(dependency.name);
      if (ensureLink(linkPath, expected)) {
        linked.push(dependency.name);
      } else {
        unchanged.push(dependency.name);
      }
    }

    const stale = readdirSync(refDir)
      .sort()
      .filter((name) => !resolved.has(name) && isSymlink(join(refDir, name)));
    for (const name of stale) {
      unlinkSync(join(refDir, name));
      removed.push(name);
    }
  } catch (error) {
    return {
      ok: false,
      error: `Failed to sync references in ${refDir}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (options.strict && (missing.length > 0 || blocked.length > 0)) {
    return {
      ok: false,
      error: [
        ...missing.map(
          (m) => `Package not found for '${describeDependency(m.dependency)}': ${m.expected}`
        ),
        ...blocked.map((name) => `${join(refDir, name)} exists and is not a symbolic link`),
      ].join("\n"),
    };
  }

  return {
    ok: true,
    value: { referenceDir: refDir, linked, unchanged, removed, missing, blocked },
  };
};
