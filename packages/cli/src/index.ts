#!/usr/bin/env -S node --import tsx
/**
 * archpack executable
 */

import { runCli } from "./cli.js";

const exitCode = await runCli(process.argv.slice(2)).catch((error: unknown) => {
  console.error("Fatal error:", error);
  return 1;
});
process.exit(exitCode);
