/**
 * archpack build command - build every architecture and publish the package
 */

import {
  buildPackage,
  defaultExec,
  formatResourceWarning,
  parsePathList,
  readListFile,
} from "@archpack/backend";
import type { BuildResult, Exec } from "@archpack/backend";
import type { ResolvedConfig, Result } from "../types.js";

/**
 * Read a path list. Headers are required; forced-linkage units are optional.
 */
const readPaths = (
  path: string,
  required: boolean
): Result<readonly string[], string> => {
  const text = readListFile(path, required);
  if (!text.ok) return text;
  return { ok: true, value: parsePathList(text.value) };
};

/**
 * Main build command
 */
export const buildCommand = (
  config: ResolvedConfig,
  exec: Exec = defaultExec
): Result<BuildResult, string> => {
  const { quiet, verbose } = config;

  const headers = readPaths(config.headersFile, true);
  if (!headers.ok) return headers;
  const forceLink = readPaths(config.forceLinkFile, false);
  if (!forceLink.ok) return forceLink;

  if (verbose) {
    console.log(`  Repository: ${config.repositoryRoot}`);
    console.log(`  Architectures: ${config.architectures.join(", ")}`);
    console.log(`  Headers: ${headers.value.length}`);
    console.log(`  Forced-linkage units: ${forceLink.value.length}`);
  }

  const result = buildPackage(
    {
      descriptor: {
        name: config.name,
        version: config.version,
        configuration: config.configuration,
        architectures: config.architectures,
      },
      projectRoot: config.projectRoot,
      sourceRoot: config.sourceRoot,
      repositoryRoot: config.repositoryRoot,
      project: config.project,
      target: config.target,
      sdks: config.sdks,
      deploymentTarget: config.deploymentTarget,
      headers: headers.value,
      forceLink: forceLink.value,
      listFiles: [config.headersFile, config.forceLinkFile, config.dependenciesFile],
      embed: config.embed,
      resourceNaming: config.resourceNaming,
      keepTemp: config.keepTemp,
      verbose,
      onStep: (message) => {
        if (!quiet) console.log(message);
      },
    },
    exec
  );
  if (!result.ok) return result;

  const { recovered, warnings, packagePath } = result.value;
  if (!quiet) {
    for (const path of recovered.restored) {
      console.warn(`Warning: restored ${path} left mutated by an interrupted build`);
    }
    for (const path of recovered.discarded) {
      console.warn(`Warning: discarded a stale snapshot of ${path}`);
    }
    for (const warning of warnings) {
      console.warn(`Warning: ${formatResourceWarning(warning)}`);
    }
    console.log(`\n✓ Package published: ${packagePath}`);
  }

  return result;
};
