/**
 * Package assembly - lays out and publishes one package directory
 *
 * <repository>/<name>[-<version>]-<configuration>/
 *   <name>.framework/Versions/A/<name>      universal binary
 *   <name>.framework/Versions/Current -> A
 *   <name>.framework/<name> -> Versions/Current/<name>
 *   Headers/                                public headers (flat)
 *   Resources/                              non-code files of the library
 *   <name>_bootstrap.m                      binary packages with forced linkage
 *   Sources/                                embedded sources
 *   archpack-package.json
 *
 * The tree is written into a staging directory next to its final location
 * and renamed into place, so a package is either complete or absent.
 */

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  renameSync,
  rmSync,
  statSync,
  symlinkSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, extname, join, relative, resolve, sep } from "node:path";
import { packageDirectoryName } from "./identifiers.js";
import { MANIFEST_FILE } from "./repository.js";
import type {
  EmbedMode,
  PackageDescriptor,
  PackageManifest,
  ResourceNamingPolicy,
  ResourceNamingWarning,
  Result,
} from "./types.js";

export const SOURCE_EXTENSIONS: readonly string[] = [
  ".m",
  ".mm",
  ".c",
  ".cc",
  ".cpp",
  ".cxx",
  ".swift",
  ".s",
];

export const HEADER_EXTENSIONS: readonly string[] = [".h", ".hh", ".hpp", ".hxx", ".pch"];

const METADATA_EXTENSIONS: readonly string[] = [
  ".xcodeproj",
  ".xcworkspace",
  ".pbxproj",
  ".xcconfig",
  ".xcscheme",
  ".entitlements",
];

const METADATA_FILE_NAMES: readonly string[] = ["archpack.json", "Info.plist"];

// Build output and reference directories that may sit inside the source root
const SKIPPED_DIRECTORY_NAMES: readonly string[] = ["build", "DerivedData", "archpack_packages"];

export const RESOURCE_SEPARATOR = "_";

export type FileKind = "source" | "header" | "metadata" | "resource";

export const classifyFile = (fileName: string): FileKind => {
  const ext = extname(fileName).toLowerCase();
  if (SOURCE_EXTENSIONS.includes(ext)) return "source";
  if (HEADER_EXTENSIONS.includes(ext)) return "header";
  if (METADATA_EXTENSIONS.includes(ext) || METADATA_FILE_NAMES.includes(fileName)) {
    return "metadata";
  }
  return "resource";
};

const toPosix = (p: string): string => p.split(sep).join("/");

/**
 * Files under `root` in sorted order, as posix paths relative to `root`.
 * Hidden entries, symbolic links, project bundles and build output
 * directories are skipped, as are the absolute paths in `exclude`.
 */
export const walkLibraryTree = (
  root: string,
  exclude: readonly string[] = []
): readonly string[] => {
  const excluded = new Set(exclude.map((p) => resolve(p)));
  const files: string[] = [];

  const visit = (dir: string): void => {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const path = join(dir, entry.name);
      if (excluded.has(path)) continue;
      if (entry.isDirectory()) {
        if (SKIPPED_DIRECTORY_NAMES.includes(entry.name)) continue;
        if (classifyFile(entry.name) === "metadata") continue;
        visit(path);
      } else if (entry.isFile()) {
        files.push(toPosix(relative(root, path)));
      }
    }
  };

  visit(resolve(root));
  return files;
};

export const checkResourceName = (
  packageName: string,
  resource: string
): ResourceNamingWarning | undefined => {
  const expectedPrefix = `${packageName}${RESOURCE_SEPARATOR}`;
  return basename(resource).startsWith(expectedPrefix)
    ? undefined
    : { resource, expectedPrefix };
};

export const formatResourceWarning = (warning: ResourceNamingWarning): string =>
  `Resource '${warning.resource}' is not prefixed with '${warning.expectedPrefix}'; it may collide with another package's resources in the consuming app`;

export type AssembleOptions = {
  readonly descriptor: PackageDescriptor;
  readonly projectRoot: string;
  readonly sourceRoot: string;
  readonly repositoryRoot: string;
  readonly embed: EmbedMode;
  readonly universalBinary?: string; // Required unless embed is "source"
  readonly headers: readonly string[]; // Relative to projectRoot
  readonly bootstrap?: { readonly fileName: string; readonly content: string };
  readonly resourceNaming: ResourceNamingPolicy;
  readonly exclude?: readonly string[]; // Absolute paths skipped while scanning
};

export type AssembleResult = {
  readonly packagePath: string;
  readonly manifest: PackageManifest;
  readonly warnings: readonly ResourceNamingWarning[];
};

type PlannedHeader = { readonly from: string; readonly name: string };

const planHeaders = (
  projectRoot: string,
  headers: readonly string[]
): Result<readonly PlannedHeader[], string> => {
  const seen = new Map<string, string>();
  const planned: PlannedHeader[] = [];

  for (const header of headers) {
    const from = resolve(projectRoot, header);
    if (!existsSync(from) || !statSync(from).isFile()) {
      return { ok: false, error: `Public header not found: ${from}` };
    }
    const name = basename(from);
    const previous = seen.get(name);
    if (previous !== undefined) {
      return {
        ok: false,
        error: `Public headers share the file name '${name}':\n- ${previous}\n- ${header}`,
      };
    }
    seen.set(name, header);
    planned.push({ from, name });
  }

  return { ok: true, value: planned };
};

const copyInto = (fromRoot: string, toRoot: string, files: readonly string[]): void => {
  for (const file of files) {
    const target = join(toRoot, file);
    mkdirSync(dirname(target), { recursive: true });
    copyFileSync(join(fromRoot, file), target);
  }
};

const writeFramework = (staging: string, name: string, binary: string): void => {
  const framework = join(staging, `${name}.framework`);
  const versionDir = join(framework, "Versions", "A");
  mkdirSync(versionDir, { recursive: true });
  copyFileSync(binary, join(versionDir, name));
  symlinkSync("A", join(framework, "Versions", "Current"));
  symlinkSync(`Versions/Current/${name}`, join(framework, name));
};

/**
 * Swap the staging directory into place. The previous package, if any, is
 * moved aside first and put back when the swap fails.
 */
const publish = (staging: string, target: string): void => {
  const previous = `${staging}.previous`;
  rmSync(previous, { recursive: true, force: true });
  const hadPrevious = existsSync(target);
  if (hadPrevious) renameSync(target, previous);
  try {
    renameSync(staging, target);
  } catch (error) {
    if (hadPrevious) renameSync(previous, target);
    throw error;
  }
  rmSync(previous, { recursive: true, force: true });
};

export const assemblePackage = (
  options: AssembleOptions
): Result<AssembleResult, string> => {
  const { descriptor, projectRoot, sourceRoot, repositoryRoot, embed } = options;
  const { name } = descriptor;

  if (embed !== "source" && !options.universalBinary) {
    return { ok: false, error: `A universal binary is required to package ${name} in '${embed}' mode` };
  }
  if (options.universalBinary && !existsSync(options.universalBinary)) {
    return { ok: false, error: `Universal binary not found: ${options.universalBinary}` };
  }
  if (!existsSync(sourceRoot)) {
    return { ok: false, error: `Source root not found: ${sourceRoot}` };
  }

  const headers = planHeaders(projectRoot, options.headers);
  if (!headers.ok) return headers;

  const files = walkLibraryTree(sourceRoot, [repositoryRoot, ...(options.exclude ?? [])]);
  const resources = files.filter((f) => classifyFile(basename(f)) === "resource");
  const sources =
    embed === "binary"
      ? []
      : files.filter((f) => {
          const kind = classifyFile(basename(f));
          return kind === "source" || kind === "header";
        });

  const warnings = resources
    .map((r) => checkResourceName(name, r))
    .filter((w): w is ResourceNamingWarning => w !== undefined);

  if (options.resourceNaming === "reject" && warnings.length > 0) {
    return {
      ok: false,
      error: [
        `Resources of ${name} must be prefixed with '${name}${RESOURCE_SEPARATOR}':`,
        ...warnings.map((w) => `- ${w.resource}`),
      ].join("\n"),
    };
  }

  const bootstrap = embed === "binary" ? options.bootstrap : undefined;
  const manifest: PackageManifest = {
    name,
    version: descriptor.version,
    configuration: descriptor.configuration,
    architectures: embed === "source" ? [] : [...descriptor.architectures].sort(),
    embed,
    bootstrap: bootstrap?.fileName,
    headers: headers.value.map((h) => h.name),
    resources,
    sources,
  };

  const target = join(repositoryRoot, packageDirectoryName(descriptor));
  const staging = join(repositoryRoot, `.${packageDirectoryName(descriptor)}.staging`);

  try {
    rmSync(staging, { recursive: true, force: true });
    mkdirSync(staging, { recursive: true });

    if (options.universalBinary && embed !== "source") {
      writeFramework(staging, name, options.universalBinary);
    }

    const headersDir = join(staging, "Headers");
    mkdirSync(headersDir, { recursive: true });
    for (const header of headers.value) {
      copyFileSync(header.from, join(headersDir, header.name));
    }

    mkdirSync(join(staging, "Resources"), { recursive: true });
    copyInto(sourceRoot, join(staging, "Resources"), resources);

    if (sources.length > 0) {
      copyInto(sourceRoot, join(staging, "Sources"), sources);
    }

    if (bootstrap) {
      writeFileSync(join(staging, bootstrap.fileName), bootstrap.content, "utf-8");
    }

    writeFileSync(
      join(staging, MANIFEST_FILE),
      JSON.stringify(manifest, null, 2) + "\n",
      "utf-8"
    );

    publish(staging, target);
  } catch (error) {
    rmSync(staging, { recursive: true, force: true });
    return {
      ok: false,
      error: `Failed to assemble ${packageDirectoryName(descriptor)}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return { ok: true, value: { packagePath: target, manifest, warnings } };
};
