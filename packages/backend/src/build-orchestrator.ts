/**
 * Main build orchestration - one linear pipeline per package:
 *
 * recover -> validate -> mutate -> xcodebuild per arch -> restore -> lipo
 *   -> bootstrap -> assemble
 */

import { existsSync, mkdirSync, rmSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { emitBootstrap } from "./bootstrap-emitter.js";
import { combineArchitectures, expectedArchitectureBinaries } from "./combiner.js";
import { defaultExec } from "./exec.js";
import { deriveTrampolines, validatePackageComponents } from "./identifiers.js";
import { assemblePackage } from "./package-assembler.js";
import { ensureWritableDirectory } from "./repository.js";
import {
  recoverInterruptedRun,
  validateUnits,
  withForcedLinkage,
  type RecoveryReport,
} from "./source-mutator.js";
import { buildArchitecture, staticLibraryName } from "./xcodebuild.js";
import type {
  EmbedMode,
  Exec,
  PackageDescriptor,
  PackageManifest,
  ResourceNamingPolicy,
  ResourceNamingWarning,
  Result,
  Trampoline,
} from "./types.js";

export type BuildOptions = {
  readonly descriptor: PackageDescriptor;
  readonly projectRoot: string;
  readonly sourceRoot: string;
  readonly repositoryRoot: string;
  readonly project?: string;
  readonly target: string;
  readonly sdks?: Readonly<Record<string, string>>;
  readonly deploymentTarget?: string;
  readonly headers: readonly string[];
  readonly forceLink: readonly string[];
  readonly listFiles?: readonly string[]; // Absolute; never packaged as resources
  readonly embed: EmbedMode;
  readonly resourceNaming: ResourceNamingPolicy;
  readonly buildRoot?: string;
  readonly keepTemp?: boolean;
  readonly verbose?: boolean;
  readonly onStep?: (message: string) => void;
};

export type BuildResult = {
  readonly packagePath: string;
  readonly manifest: PackageManifest;
  readonly warnings: readonly ResourceNamingWarning[];
  readonly recovered: RecoveryReport;
};

export const defaultBuildRoot = (projectRoot: string): string =>
  join(projectRoot, ".archpack", "build");

const checkHeadersExist = (
  projectRoot: string,
  headers: readonly string[]
): Result<void, string> => {
  for (const header of headers) {
    const path = resolve(projectRoot, header);
    if (!existsSync(path) || !statSync(path).isFile()) {
      return { ok: false, error: `Public header not found: ${path}` };
    }
  }
  return { ok: true, value: undefined };
};

/**
 * Run xcodebuild for every architecture, one after another
 */
const buildAllArchitectures = (
  options: BuildOptions,
  buildRoot: string,
  exec: Exec
): Result<void, string> => {
  const { descriptor, projectRoot, project, target, sdks, deploymentTarget, verbose } =
    options;

  for (const arch of descriptor.architectures) {
    options.onStep?.(`Building ${descriptor.name} for ${arch}...`);
    const result = buildArchitecture(
      {
        projectRoot,
        buildRoot,
        project,
        target,
        configuration: descriptor.configuration,
        arch,
        sdk: sdks?.[arch],
        deploymentTarget,
        verbose,
      },
      exec
    );
    if (!result.ok) return result;
  }
  return { ok: true, value: undefined };
};

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const runPipeline = (
  options: BuildOptions,
  buildRoot: string,
  exec: Exec
): Result<BuildResult, string> => {
  const { descriptor, projectRoot, embed } = options;
  const step = (message: string): void => options.onStep?.(message);

  const repository = ensureWritableDirectory(options.repositoryRoot, "Repository");
  if (!repository.ok) return repository;

  const recovered = recoverInterruptedRun(projectRoot);
  if (!recovered.ok) return recovered;

  const headers = checkHeadersExist(projectRoot, options.headers);
  if (!headers.ok) return headers;

  let trampolines: readonly Trampoline[] = [];
  if (embed === "binary") {
    const derived = deriveTrampolines(descriptor.name, options.forceLink);
    if (!derived.ok) return derived;
    const valid = validateUnits(projectRoot, derived.value);
    if (!valid.ok) return valid;
    trampolines = derived.value;
  }

  if (descriptor.architectures.length === 0 && embed !== "source") {
    return { ok: false, error: "No target architectures configured" };
  }

  let universalBinary: string | undefined;

  if (embed !== "source") {
    rmSync(buildRoot, { recursive: true, force: true });
    mkdirSync(buildRoot, { recursive: true });

    const build = (): Result<void, string> =>
      buildAllArchitectures(options, buildRoot, exec);

    if (trampolines.length > 0) {
      step(`Injecting ${trampolines.length} forced-linkage trampoline(s)...`);
      const result = withForcedLinkage({ projectRoot, trampolines }, build);
      if (!result.ok) return result;
      step("Restored forced-linkage files");
    } else {
      const result = build();
      if (!result.ok) return result;
    }

    step(`Combining ${descriptor.architectures.join(", ")} into a universal binary...`);
    const combined = combineArchitectures(
      {
        binaries: expectedArchitectureBinaries(
          buildRoot,
          descriptor.configuration,
          descriptor.name,
          descriptor.architectures
        ),
        output: join(buildRoot, "universal", staticLibraryName(descriptor.name)),
        projectRoot,
      },
      exec
    );
    if (!combined.ok) return combined;
    universalBinary = combined.value;
  }

  step("Assembling package...");
  const assembled = assemblePackage({
    descriptor,
    projectRoot,
    sourceRoot: options.sourceRoot,
    repositoryRoot: repository.value,
    embed,
    universalBinary,
    headers: options.headers,
    bootstrap: emitBootstrap(descriptor.name, trampolines, embed),
    resourceNaming: options.resourceNaming,
    exclude: [buildRoot, join(projectRoot, ".archpack"), ...(options.listFiles ?? [])],
  });
  if (!assembled.ok) return assembled;

  return {
    ok: true,
    value: { ...assembled.value, recovered: recovered.value },
  };
};

/**
 * Build and publish one package. Filesystem errors thrown anywhere in the
 * pipeline come back as a failed result; the build directory is removed
 * either way unless `keepTemp` is set.
 */
export const buildPackage = (
  options: BuildOptions,
  exec: Exec = defaultExec
): Result<BuildResult, string> => {
  const components = validatePackageComponents(options.descriptor);
  if (!components.ok) return components;

  const buildRoot = options.buildRoot ?? defaultBuildRoot(options.projectRoot);

  let outcome: Result<BuildResult, string>;
  try {
    outcome = runPipeline(options, buildRoot, exec);
  } catch (error) {
    outcome = { ok: false, error: `Build failed: ${errorMessage(error)}` };
  }

  if (!options.keepTemp) {
    try {
      rmSync(buildRoot, { recursive: true, force: true });
    } catch (error) {
      const message = `Failed to remove build directory ${buildRoot}: ${errorMessage(error)}`;
      if (!outcome.ok) {
        return { ok: false, error: `${outcome.error}\n${message}` };
      }
      options.onStep?.(`Warning: ${message}`);
    }
  }

  return outcome;
};
