/**
 * archpack backend - forced linkage, multi-architecture packaging and
 * reference sync
 */

// Export main build function
export { buildPackage, defaultBuildRoot } from "./build-orchestrator.js";
export type { BuildOptions, BuildResult } from "./build-orchestrator.js";

// Export types
export type {
  ArchitectureBinary,
  DependencyDeclaration,
  EmbedMode,
  Exec,
  ExecResult,
  PackageDescriptor,
  PackageManifest,
  ResourceNamingPolicy,
  ResourceNamingWarning,
  Result,
  Trampoline,
} from "./types.js";

// Export building blocks
export { defaultExec } from "./exec.js";
export {
  deriveTrampolines,
  packageDirectoryName,
  PACKAGE_COMPONENT,
  trampolineIdentifier,
  validatePackageComponents,
} from "./identifiers.js";
export {
  beginMutation,
  recoverInterruptedRun,
  restoreMutation,
  withForcedLinkage,
  type RecoveryReport,
} from "./source-mutator.js";
export { generateBootstrapSource, emitBootstrap } from "./bootstrap-emitter.js";
export { combineArchitectures } from "./combiner.js";
export { assemblePackage, formatResourceWarning } from "./package-assembler.js";
export {
  defaultRepositoryRoot,
  listPackages,
  resolveRepositoryRoot,
  REPOSITORY_ENV,
  type RepositoryEntry,
} from "./repository.js";
export {
  describeDependency,
  syncReferences,
  REFERENCE_DIR,
  type SyncReport,
} from "./reference-sync.js";
export { parseDependencyList, parsePathList, readListFile } from "./lists.js";
