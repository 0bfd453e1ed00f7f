/**
 * xcodebuild wrapper: one blocking build per architecture
 */

import { join } from "node:path";
import { describeFailure } from "./exec.js";
import type { Exec, Result } from "./types.js";

const DEVICE_ARCHITECTURES: readonly string[] = ["arm64", "arm64e", "armv7", "armv7s"];
const SIMULATOR_ARCHITECTURES: readonly string[] = ["x86_64", "i386"];

/**
 * SDK an architecture is built against unless the config says otherwise
 */
export const defaultSdkForArchitecture = (arch: string): string | undefined => {
  if (DEVICE_ARCHITECTURES.includes(arch)) return "iphoneos";
  if (SIMULATOR_ARCHITECTURES.includes(arch)) return "iphonesimulator";
  return undefined;
};

export const architectureBuildDir = (
  buildRoot: string,
  configuration: string,
  arch: string
): string => join(buildRoot, `${configuration}-${arch}`);

export const staticLibraryName = (name: string): string => `lib${name}.a`;

export type ArchitectureBuildOptions = {
  readonly projectRoot: string;
  readonly buildRoot: string;
  readonly project?: string; // .xcodeproj relative to projectRoot
  readonly target: string;
  readonly configuration: string;
  readonly arch: string;
  readonly sdk?: string;
  readonly deploymentTarget?: string;
  readonly verbose?: boolean;
};

export const xcodebuildArgs = (options: ArchitectureBuildOptions): string[] => {
  const { project, target, configuration, arch, buildRoot, deploymentTarget } =
    options;
  const sdk = options.sdk ?? defaultSdkForArchitecture(arch);

  const args: string[] = [];
  if (project) args.push("-project", project);
  args.push("-target", target, "-configuration", configuration, "-arch", arch);
  if (sdk) args.push("-sdk", sdk);
  args.push(
    "ONLY_ACTIVE_ARCH=NO",
    `CONFIGURATION_BUILD_DIR=${architectureBuildDir(buildRoot, configuration, arch)}`,
    `OBJROOT=${join(buildRoot, "obj", arch)}`
  );
  if (deploymentTarget) {
    args.push(`IPHONEOS_DEPLOYMENT_TARGET=${deploymentTarget}`);
  }
  args.push("build");
  return args;
};

/**
 * Build the library for one architecture. Returns the build output dir.
 */
export const buildArchitecture = (
  options: ArchitectureBuildOptions,
  exec: Exec
): Result<string, string> => {
  const result = exec(
    "xcodebuild",
    xcodebuildArgs(options),
    options.projectRoot,
    options.verbose ? "inherit" : "pipe"
  );

  if (result.signal) {
    return {
      ok: false,
      error: `xcodebuild for architecture '${options.arch}' was interrupted by ${result.signal}`,
    };
  }
  if (result.status !== 0) {
    return {
      ok: false,
      error: `xcodebuild failed for architecture '${options.arch}':\n${describeFailure(result)}`,
    };
  }

  return {
    ok: true,
    value: architectureBuildDir(options.buildRoot, options.configuration, options.arch),
  };
};
