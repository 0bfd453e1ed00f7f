/**
 * Local package repository: a flat directory of package directories
 */

import { accessSync, constants, existsSync, mkdirSync, readdirSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { PackageManifest, Result } from "./types.js";

export const MANIFEST_FILE = "archpack-package.json";
export const REPOSITORY_ENV = "ARCHPACK_REPOSITORY";

export const defaultRepositoryRoot = (): string =>
  join(homedir(), ".archpack", "repository");

/**
 * Repository root precedence: explicit option, environment, config file,
 * then the default under the home directory.
 */
export const resolveRepositoryRoot = (sources: {
  readonly override?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly configured?: string;
  readonly baseDir?: string;
}): string => {
  const baseDir = sources.baseDir ?? process.cwd();
  const fromEnv = sources.env?.[REPOSITORY_ENV];
  const chosen =
    sources.override || fromEnv || sources.configured || defaultRepositoryRoot();
  return resolve(baseDir, chosen);
};

/**
 * Create a directory if needed and make sure we can write into it
 */
export const ensureWritableDirectory = (
  path: string,
  role: string
): Result<string, string> => {
  try {
    mkdirSync(path, { recursive: true });
  } catch (error) {
    return {
      ok: false,
      error: `Cannot create ${role} ${path}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
  if (!statSync(path).isDirectory()) {
    return { ok: false, error: `${role} is not a directory: ${path}` };
  }
  try {
    accessSync(path, constants.W_OK);
  } catch {
    return { ok: false, error: `${role} is not writable: ${path}` };
  }
  return { ok: true, value: path };
};

const isManifest = (value: unknown): value is PackageManifest => {
  if (typeof value !== "object" || value === null) return false;
  const m = value as Record<string, unknown>;
  return (
    typeof m.name === "string" &&
    typeof m.configuration === "string" &&
    Array.isArray(m.architectures) &&
    typeof m.embed === "string"
  );
};

export const readManifest = (
  packageDir: string
): Result<PackageManifest, string> => {
  const path = join(packageDir, MANIFEST_FILE);
  if (!existsSync(path)) {
    return { ok: false, error: `No ${MANIFEST_FILE} in ${packageDir}` };
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!isManifest(parsed)) {
      return { ok: false, error: `Invalid package manifest: ${path}` };
    }
    return { ok: true, value: parsed };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

export type RepositoryEntry = {
  readonly directory: string; // Name inside the repository
  readonly path: string;
  readonly manifest?: PackageManifest;
};

/**
 * Packages in the repository, sorted by directory name. Staging directories
 * of an assembly in progress are skipped.
 */
export const listPackages = (
  repositoryRoot: string
): Result<readonly RepositoryEntry[], string> => {
  if (!existsSync(repositoryRoot)) return { ok: true, value: [] };

  try {
    const entries = readdirSync(repositoryRoot, { withFileTypes: true })
      .filter((e) => e.isDirectory() && !e.name.startsWith("."))
      .map((e) => e.name)
      .sort()
      .map((directory): RepositoryEntry => {
        const path = join(repositoryRoot, directory);
        const manifest = readManifest(path);
        return manifest.ok
          ? { directory, path, manifest: manifest.value }
          : { directory, path };
      });
    return { ok: true, value: entries };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to read repository ${repositoryRoot}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};
