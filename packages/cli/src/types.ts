/**
 * Type definitions for CLI
 */

import type { EmbedMode, ResourceNamingPolicy } from "@archpack/backend";

export type { Result } from "@archpack/backend";

/**
 * archpack configuration file (archpack.json)
 */
export type ArchpackConfig = {
  readonly $schema?: string;
  readonly name: string;
  readonly version?: string;
  readonly project?: string; // .xcodeproj, relative to the config file
  readonly target?: string; // Defaults to name
  readonly sourceRoot?: string;
  readonly architectures?: readonly string[];
  readonly sdks?: Readonly<Record<string, string>>;
  readonly deploymentTarget?: string;
  readonly headers?: string; // Public-header list file
  readonly forceLink?: string; // Forced-linkage list file
  readonly dependencies?: string; // Dependency-declaration list file
  readonly repository?: string;
  readonly embed?: EmbedMode;
  readonly resourceNaming?: ResourceNamingPolicy;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  // build
  tag?: string;
  embed?: EmbedMode;
  minOs?: string;
  arch?: string[];
  strictResources?: boolean;
  keepTemp?: boolean;
  // build, sync, list
  repository?: string;
  // sync
  configuration?: string;
  deps?: string;
  strict?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly name: string;
  readonly version: string | undefined;
  readonly configuration: string;
  readonly projectRoot: string; // Directory containing archpack.json
  readonly sourceRoot: string;
  readonly project: string | undefined;
  readonly target: string;
  readonly architectures: readonly string[];
  readonly sdks: Readonly<Record<string, string>>;
  readonly deploymentTarget: string | undefined;
  readonly headersFile: string;
  readonly forceLinkFile: string;
  readonly dependenciesFile: string;
  readonly repositoryRoot: string;
  readonly embed: EmbedMode;
  readonly resourceNaming: ResourceNamingPolicy;
  readonly keepTemp: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
