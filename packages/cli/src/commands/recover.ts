/**
 * archpack recover command - undo an interrupted build's source mutation
 */

import { recoverInterruptedRun } from "@archpack/backend";
import type { RecoveryReport } from "@archpack/backend";
import type { Result } from "../types.js";

export const recoverCommand = (
  projectRoot: string,
  quiet = false
): Result<RecoveryReport, string> => {
  const result = recoverInterruptedRun(projectRoot);
  if (!result.ok) return result;

  if (!quiet) {
    const { restored, discarded } = result.value;
    for (const path of restored) console.log(`  restored ${path}`);
    for (const path of discarded) console.log(`  discarded stale snapshot of ${path}`);
    console.log(
      restored.length + discarded.length === 0
        ? "✓ Nothing to recover"
        : `✓ Recovered ${restored.length} file(s)`
    );
  }

  return result;
};
