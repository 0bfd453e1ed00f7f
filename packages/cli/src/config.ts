/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { PACKAGE_COMPONENT, resolveRepositoryRoot } from "@archpack/backend";
import type { EmbedMode, ResourceNamingPolicy } from "@archpack/backend";
import type { ArchpackConfig, CliOptions, ResolvedConfig, Result } from "./types.js";

export const CONFIG_FILE = "archpack.json";

export const DEFAULT_CONFIGURATION = "Release";
export const DEFAULT_ARCHITECTURES: readonly string[] = ["arm64", "x86_64"];
export const DEFAULT_HEADERS_FILE = "headers.txt";
export const DEFAULT_FORCE_LINK_FILE = "forcelink.txt";
export const DEFAULT_DEPENDENCIES_FILE = "archpack-deps.txt";

const EMBED_MODES: readonly EmbedMode[] = ["binary", "source", "both"];
const NAMING_POLICIES: readonly ResourceNamingPolicy[] = ["warn", "reject"];

export const isEmbedMode = (value: unknown): value is EmbedMode =>
  typeof value === "string" && (EMBED_MODES as readonly string[]).includes(value);

const isNamingPolicy = (value: unknown): value is ResourceNamingPolicy =>
  typeof value === "string" && (NAMING_POLICIES as readonly string[]).includes(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((v) => typeof v === "string");

/**
 * Load archpack.json
 */
export const loadConfig = (
  configPath: string
): Result<ArchpackConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const config = JSON.parse(content) as ArchpackConfig;

    // Validate required fields
    if (!config.name || typeof config.name !== "string") {
      return { ok: false, error: "archpack.json: 'name' is required" };
    }
    if (!PACKAGE_COMPONENT.test(config.name)) {
      return { ok: false, error: `archpack.json: invalid package name '${config.name}'` };
    }
    if (
      config.version !== undefined &&
      (typeof config.version !== "string" || !PACKAGE_COMPONENT.test(config.version))
    ) {
      return { ok: false, error: `archpack.json: invalid version '${String(config.version)}'` };
    }
    if (config.embed !== undefined && !isEmbedMode(config.embed)) {
      return {
        ok: false,
        error: `archpack.json: 'embed' must be one of ${EMBED_MODES.join(", ")}`,
      };
    }
    if (config.resourceNaming !== undefined && !isNamingPolicy(config.resourceNaming)) {
      return {
        ok: false,
        error: `archpack.json: 'resourceNaming' must be one of ${NAMING_POLICIES.join(", ")}`,
      };
    }
    if (config.architectures !== undefined && !isStringArray(config.architectures)) {
      return { ok: false, error: "archpack.json: 'architectures' must be an array of strings" };
    }

    return { ok: true, value: config };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse archpack.json: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find archpack.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find archpack.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing archpack.json
 */
export const resolveConfig = (
  config: ArchpackConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  configuration?: string,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig => {
  const fromRoot = (p: string): string => resolve(projectRoot, p);
  const architectures =
    cliOptions.arch && cliOptions.arch.length > 0
      ? cliOptions.arch
      : (config.architectures ?? DEFAULT_ARCHITECTURES);

  return {
    name: config.name,
    version: cliOptions.tag ?? config.version,
    configuration: configuration ?? DEFAULT_CONFIGURATION,
    projectRoot,
    sourceRoot: fromRoot(config.sourceRoot ?? "."),
    project: config.project,
    target: config.target ?? config.name,
    architectures: [...new Set(architectures)],
    sdks: config.sdks ?? {},
    deploymentTarget: cliOptions.minOs ?? config.deploymentTarget,
    headersFile: fromRoot(config.headers ?? DEFAULT_HEADERS_FILE),
    forceLinkFile: fromRoot(config.forceLink ?? DEFAULT_FORCE_LINK_FILE),
    dependenciesFile: fromRoot(config.dependencies ?? DEFAULT_DEPENDENCIES_FILE),
    repositoryRoot: resolveRepositoryRoot({
      override: cliOptions.repository,
      env,
      configured: config.repository,
      baseDir: projectRoot,
    }),
    embed: cliOptions.embed ?? config.embed ?? "binary",
    resourceNaming: cliOptions.strictResources
      ? "reject"
      : (config.resourceNaming ?? "warn"),
    keepTemp: cliOptions.keepTemp ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};

/**
 * Consumer-side settings for `archpack sync`. An archpack.json is optional
 * there; without one the working directory is the workspace.
 */
export type SyncSettings = {
  readonly workspaceRoot: string;
  readonly repositoryRoot: string;
  readonly dependenciesFile: string;
  readonly configuration: string;
  readonly strict: boolean;
  readonly quiet: boolean;
};

export const resolveSyncSettings = (
  config: ArchpackConfig | undefined,
  cliOptions: CliOptions,
  workspaceRoot: string,
  env: NodeJS.ProcessEnv = process.env
): SyncSettings => ({
  workspaceRoot,
  repositoryRoot: resolveRepositoryRoot({
    override: cliOptions.repository,
    env,
    configured: config?.repository,
    baseDir: workspaceRoot,
  }),
  dependenciesFile: cliOptions.deps
    ? resolve(cliOptions.deps)
    : resolve(workspaceRoot, config?.dependencies ?? DEFAULT_DEPENDENCIES_FILE),
  configuration: cliOptions.configuration ?? DEFAULT_CONFIGURATION,
  strict: cliOptions.strict ?? false,
  quiet: cliOptions.quiet ?? false,
});
