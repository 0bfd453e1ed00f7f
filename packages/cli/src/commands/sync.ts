/**
 * archpack sync command - link declared packages into the workspace
 */

import {
  describeDependency,
  parseDependencyList,
  readListFile,
  syncReferences,
} from "@archpack/backend";
import type { SyncReport } from "@archpack/backend";
import type { SyncSettings } from "../config.js";
import type { Result } from "../types.js";

/**
 * Main sync command. A missing dependency list syncs an empty set, which
 * removes every link in the reference directory.
 */
export const syncCommand = (settings: SyncSettings): Result<SyncReport, string> => {
  const { quiet } = settings;

  const text = readListFile(settings.dependenciesFile, false);
  if (!text.ok) return text;
  const dependencies = parseDependencyList(text.value);
  if (!dependencies.ok) {
    return { ok: false, error: `${settings.dependenciesFile}: ${dependencies.error}` };
  }

  const result = syncReferences({
    workspaceRoot: settings.workspaceRoot,
    repositoryRoot: settings.repositoryRoot,
    dependencies: dependencies.value,
    configuration: settings.configuration,
    strict: settings.strict,
  });
  if (!result.ok) return result;

  const report = result.value;
  if (!quiet) {
    for (const name of report.linked) console.log(`  linked ${name}`);
    for (const name of report.removed) console.log(`  removed ${name}`);
    for (const { dependency, expected } of report.missing) {
      console.warn(
        `Warning: package not found for '${describeDependency(dependency)}': ${expected}`
      );
    }
    for (const name of report.blocked) {
      console.warn(
        `Warning: ${name} in ${report.referenceDir} is not a symbolic link; left untouched`
      );
    }
    console.log(
      `\n✓ Synced ${report.linked.length + report.unchanged.length} package(s) into ${report.referenceDir}`
    );
  }

  return result;
};
