/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { defaultExec, resolveRepositoryRoot } from "@archpack/backend";
import type { Exec } from "@archpack/backend";
import {
  loadConfig,
  findConfig,
  resolveConfig,
  resolveSyncSettings,
} from "../config.js";
import { buildCommand } from "../commands/build.js";
import { syncCommand } from "../commands/sync.js";
import { listCommand } from "../commands/list.js";
import { recoverCommand } from "../commands/recover.js";
import type { ArchpackConfig, CliOptions, Result } from "../types.js";
import { EXIT, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Process surroundings, replaceable in tests
 */
export type CliContext = {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly exec?: Exec;
};

type LoadedConfig = {
  readonly config: ArchpackConfig;
  readonly projectRoot: string; // Directory containing archpack.json
};

/**
 * Locate and load archpack.json. `null` when none was found and none was
 * named with --config.
 */
const locateConfig = (
  options: CliOptions,
  cwd: string
): Result<LoadedConfig | null, string> => {
  const configPath = options.config ? resolve(cwd, options.config) : findConfig(cwd);
  if (!configPath) return { ok: true, value: null };

  const configResult = loadConfig(configPath);
  if (!configResult.ok) return configResult;
  return {
    ok: true,
    value: { config: configResult.value, projectRoot: dirname(configPath) },
  };
};

const COMMANDS: readonly string[] = ["build", "sync", "list", "recover"];

const OPTION_FLAGS: readonly (readonly [keyof CliOptions, string])[] = [
  ["tag", "--tag"],
  ["embed", "--embed"],
  ["minOs", "--min-os"],
  ["arch", "--arch"],
  ["strictResources", "--strict-resources"],
  ["keepTemp", "--keep-temp"],
  ["repository", "--repository"],
  ["configuration", "--configuration"],
  ["deps", "--deps"],
  ["strict", "--strict"],
];

// --verbose, --quiet and --config apply to every command
const COMMAND_OPTIONS: Readonly<Record<string, readonly (keyof CliOptions)[]>> = {
  build: ["tag", "embed", "minOs", "arch", "strictResources", "keepTemp", "repository"],
  sync: ["repository", "configuration", "deps", "strict"],
  list: ["repository"],
  recover: [],
};

/**
 * First option given on the command line that `command` does not take
 */
const unsupportedOption = (command: string, options: CliOptions): string | undefined => {
  const allowed = COMMAND_OPTIONS[command] ?? [];
  const found = OPTION_FLAGS.find(
    ([key]) => options[key] !== undefined && !allowed.includes(key)
  );
  return found?.[1];
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  context: CliContext = {}
): Promise<number> => {
  const cwd = context.cwd ?? process.cwd();
  const env = context.env ?? process.env;
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`archpack v${VERSION}`);
    return EXIT.ok;
  }

  if (parsed.command === "help" || (!parsed.command && !parsed.error)) {
    showHelp();
    return EXIT.ok;
  }

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'archpack --help' for usage information");
    return EXIT.usage;
  }

  if (!COMMANDS.includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'archpack --help' for usage information");
    return EXIT.usage;
  }

  if (parsed.positional !== undefined && parsed.command !== "build") {
    console.error(`Error: Unexpected argument '${parsed.positional}'`);
    return EXIT.usage;
  }

  const unsupported = unsupportedOption(parsed.command, parsed.options);
  if (unsupported) {
    console.error(`Error: '${parsed.command}' does not take ${unsupported}`);
    console.error("Run 'archpack --help' for usage information");
    return EXIT.usage;
  }

  // Paths given on the command line are relative to the working directory
  const options: CliOptions = {
    ...parsed.options,
    repository: parsed.options.repository && resolve(cwd, parsed.options.repository),
    deps: parsed.options.deps && resolve(cwd, parsed.options.deps),
  };

  const located = locateConfig(options, cwd);
  if (!located.ok) {
    console.error(`Error: ${located.error}`);
    return EXIT.invalidConfig;
  }
  const loaded = located.value;
  const quiet = options.quiet ?? false;

  // Commands that work without archpack.json
  switch (parsed.command) {
    case "sync": {
      const settings = resolveSyncSettings(
        loaded?.config,
        options,
        loaded?.projectRoot ?? cwd,
        env
      );
      const result = syncCommand(settings);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT.sync;
      }
      return EXIT.ok;
    }

    case "list": {
      const repositoryRoot = resolveRepositoryRoot({
        override: options.repository,
        env,
        configured: loaded?.config.repository,
        baseDir: loaded?.projectRoot ?? cwd,
      });
      const result = listCommand(repositoryRoot, quiet);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT.list;
      }
      return EXIT.ok;
    }
  }

  if (!loaded) {
    console.error("Error: No archpack.json found");
    console.error("Create one in the library's project root with at least a 'name'");
    return EXIT.noConfig;
  }

  switch (parsed.command) {
    case "recover": {
      const result = recoverCommand(loaded.projectRoot, quiet);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT.recover;
      }
      return EXIT.ok;
    }

    default: {
      const config = resolveConfig(
        loaded.config,
        options,
        loaded.projectRoot,
        parsed.positional,
        env
      );
      const result = buildCommand(config, context.exec ?? defaultExec);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT.build;
      }
      return EXIT.ok;
    }
  }
};
