/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

export const VERSION = packageJson.version;

/**
 * Process exit codes. Advisories never change the exit code.
 */
export const EXIT = {
  ok: 0,
  invalidConfig: 1,
  usage: 2,
  noConfig: 3,
  build: 6,
  sync: 7,
  list: 9,
  recover: 10,
} as const;
