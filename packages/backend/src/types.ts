/**
 * Type definitions for package assembly and reference sync
 */

/**
 * Result type for operations
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * What a package carries: a pre-linked universal binary, the library's
 * source units, or both.
 */
export type EmbedMode = "binary" | "source" | "both";

/**
 * Policy for resource files whose name lacks the package prefix
 */
export type ResourceNamingPolicy = "warn" | "reject";

/**
 * Package identity
 */
export type PackageDescriptor = {
  readonly name: string;
  readonly version?: string;
  readonly configuration: string;
  readonly architectures: readonly string[];
};

/**
 * Forced-linkage trampoline derived from one source unit
 */
export type Trampoline = {
  readonly identifier: string;
  readonly unitPath: string; // Relative to the project root
};

/**
 * Per-architecture static archive produced by the external build
 */
export type ArchitectureBinary = {
  readonly arch: string;
  readonly path: string;
};

/**
 * Manifest written into every package (archpack-package.json)
 */
export type PackageManifest = {
  readonly name: string;
  readonly version?: string;
  readonly configuration: string;
  readonly architectures: readonly string[];
  readonly embed: EmbedMode;
  readonly bootstrap?: string;
  readonly headers: readonly string[];
  readonly resources: readonly string[];
  readonly sources: readonly string[];
};

/**
 * Advisory raised for a resource that does not carry the package prefix
 */
export type ResourceNamingWarning = {
  readonly resource: string; // Relative to the resources root
  readonly expectedPrefix: string;
};

/**
 * Dependency declaration read on the consumer side
 */
export type DependencyDeclaration = {
  readonly name: string;
  readonly version?: string;
};

/**
 * External tool execution
 */
export type ExecResult = {
  readonly status: number | null;
  readonly signal?: NodeJS.Signals | null; // Set when the tool was killed by a signal
  readonly stdout: string;
  readonly stderr: string;
};

export type Exec = (
  command: string,
  args: readonly string[],
  cwd: string,
  stdio: "inherit" | "pipe"
) => ExecResult;
