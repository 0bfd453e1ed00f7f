/**
 * CLI argument parser
 */

import { isEmbedMode } from "../config.js";
import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  positional?: string; // build: configuration name
  options: CliOptions;
  error?: string; // Usage error, reported with exit code 2
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let positional: string | undefined;

  const usage = (error: string): ParsedArgs => ({ command, positional, options, error });

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !arg.startsWith("-")) {
      if (positional !== undefined) {
        return usage(`Unexpected argument '${arg}'`);
      }
      positional = arg;
      continue;
    }

    // Options taking a value
    const value = (): string | undefined => {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("-")) return undefined;
      i++;
      return next;
    };

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        const config = value();
        if (!config) return usage(`${arg} requires a file`);
        options.config = config;
        break;
      }
      case "-t":
      case "--tag": {
        const tag = value();
        if (!tag) return usage(`${arg} requires a version`);
        options.tag = tag;
        break;
      }
      case "--embed": {
        const embed = value();
        if (!isEmbedMode(embed)) {
          return usage("--embed must be one of binary, source, both");
        }
        options.embed = embed;
        break;
      }
      case "--min-os": {
        const minOs = value();
        if (!minOs) return usage("--min-os requires a version");
        options.minOs = minOs;
        break;
      }
      case "--arch": {
        const arch = value();
        if (!arch) return usage("--arch requires an architecture");
        options.arch = options.arch || [];
        options.arch.push(arch);
        break;
      }
      case "--repository": {
        const repository = value();
        if (!repository) return usage("--repository requires a directory");
        options.repository = repository;
        break;
      }
      case "--strict-resources":
        options.strictResources = true;
        break;
      case "-k":
      case "--keep-temp":
        options.keepTemp = true;
        break;
      case "--configuration": {
        const configuration = value();
        if (!configuration) return usage("--configuration requires a name");
        options.configuration = configuration;
        break;
      }
      case "--deps": {
        const deps = value();
        if (!deps) return usage("--deps requires a file");
        options.deps = deps;
        break;
      }
      case "--strict":
        options.strict = true;
        break;
      default:
        return usage(`Unknown option '${arg}'`);
    }
  }

  return { command, positional, options };
};
