/**
 * Blocking wrapper around external tools (xcodebuild, lipo)
 */

import { spawnSync } from "node:child_process";
import type { Exec, ExecResult } from "./types.js";

export const defaultExec: Exec = (command, args, cwd, stdio) => {
  const result = spawnSync(command, args, {
    cwd,
    stdio,
    encoding: "utf-8",
  });

  if (result.error) {
    return {
      status: null,
      stdout: "",
      stderr: `Failed to execute ${command}: ${result.error.message}`,
    };
  }

  return {
    status: result.status,
    signal: result.signal,
    stdout: typeof result.stdout === "string" ? result.stdout : "",
    stderr: typeof result.stderr === "string" ? result.stderr : "",
  };
};

/**
 * Best available diagnostic text for a failed invocation
 */
export const describeFailure = (result: ExecResult): string =>
  result.signal
    ? `Terminated by ${result.signal}`
    : result.stderr.trim() ||
      result.stdout.trim() ||
      `Exit code ${result.status === null ? "unknown" : result.status}`;
