/**
 * CLI - Public API
 */

export { VERSION, EXIT } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export type { ParsedArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
export type { CliContext } from "./dispatcher.js";
