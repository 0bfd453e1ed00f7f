/**
 * archpack list command - show the packages in the repository
 */

import { listPackages } from "@archpack/backend";
import type { RepositoryEntry } from "@archpack/backend";
import type { Result } from "../types.js";

export const formatEntry = (entry: RepositoryEntry): string => {
  const { manifest } = entry;
  if (!manifest) return `${entry.directory}  (no manifest)`;
  return `${entry.directory}  [${manifest.architectures.join(", ")}] embed=${manifest.embed}`;
};

export const listCommand = (
  repositoryRoot: string,
  quiet = false
): Result<readonly RepositoryEntry[], string> => {
  const result = listPackages(repositoryRoot);
  if (!result.ok) return result;

  if (!quiet) {
    if (result.value.length === 0) {
      console.log(`No packages in ${repositoryRoot}`);
    } else {
      console.log(`${repositoryRoot}:`);
      for (const entry of result.value) console.log(`  ${formatEntry(entry)}`);
    }
  }

  return result;
};
