/**
 * archpack command line - programmatic entry (the executable is index.ts)
 */

export { VERSION, EXIT, showHelp, parseArgs, runCli } from "./cli/index.js";
export type { CliContext, ParsedArgs } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
