/**
 * Fuse per-architecture static archives into one universal binary (lipo)
 */

import { existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { describeFailure } from "./exec.js";
import { architectureBuildDir, staticLibraryName } from "./xcodebuild.js";
import type { ArchitectureBinary, Exec, Result } from "./types.js";

/**
 * Where the external build leaves each architecture's archive
 */
export const expectedArchitectureBinaries = (
  buildRoot: string,
  configuration: string,
  name: string,
  architectures: readonly string[]
): readonly ArchitectureBinary[] =>
  architectures.map((arch) => ({
    arch,
    path: join(architectureBuildDir(buildRoot, configuration, arch), staticLibraryName(name)),
  }));

const byArch = (a: ArchitectureBinary, b: ArchitectureBinary): number =>
  a.arch < b.arch ? -1 : a.arch > b.arch ? 1 : 0;

export type CombineOptions = {
  readonly binaries: readonly ArchitectureBinary[];
  readonly output: string;
  readonly projectRoot: string;
};

/**
 * `lipo -archs` prints the architectures of a binary separated by spaces
 */
export const parseLipoArchs = (stdout: string): readonly string[] =>
  stdout.split(/\s+/).filter((a) => a.length > 0);

export const combineArchitectures = (
  options: CombineOptions,
  exec: Exec
): Result<string, string> => {
  const { output, projectRoot } = options;
  const binaries = [...options.binaries].sort(byArch);

  if (binaries.length === 0) {
    return { ok: false, error: "No architectures requested" };
  }

  for (const { arch, path } of binaries) {
    if (!existsSync(path)) {
      return {
        ok: false,
        error:
          `Missing binary for architecture '${arch}': ${path}\n` +
          `The project's product name must match the package name.`,
      };
    }
  }

  try {
    mkdirSync(dirname(output), { recursive: true });
  } catch (error) {
    return {
      ok: false,
      error: `Failed to create ${dirname(output)}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const create = exec(
    "lipo",
    ["-create", ...binaries.map((b) => b.path), "-output", output],
    projectRoot,
    "pipe"
  );
  if (create.status !== 0) {
    return { ok: false, error: `lipo -create failed:\n${describeFailure(create)}` };
  }

  const info = exec("lipo", ["-archs", output], projectRoot, "pipe");
  if (info.status !== 0) {
    return { ok: false, error: `lipo -archs failed:\n${describeFailure(info)}` };
  }

  const requested = binaries.map((b) => b.arch);
  const fused = [...parseLipoArchs(info.stdout)].sort();
  if (fused.join(" ") !== requested.join(" ")) {
    return {
      ok: false,
      error: `Universal binary has architectures [${fused.join(", ")}], expected [${requested.join(", ")}]`,
    };
  }

  return { ok: true, value: output };
};
