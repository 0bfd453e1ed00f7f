/**
 * Name-derived identities: trampoline identifiers and package directory names.
 *
 * Both are pure functions of their inputs so a re-run derives the same names.
 */

import { basename } from "node:path";
import type { PackageDescriptor, Result, Trampoline } from "./types.js";

export const TRAMPOLINE_PREFIX = "archpack_forcelink";

/**
 * Encode arbitrary text as a C identifier fragment.
 *
 * Lower-case letters and digits pass through; an upper-case letter becomes
 * `_` followed by its lower-case form; `_` and every other character become
 * `__<hex code point>_`. The mapping is injective, so distinct inputs never
 * share an encoding.
 */
export const encodeIdentifierPart = (text: string): string => {
  let out = "";
  for (const ch of text) {
    if (/^[a-z0-9]$/.test(ch)) {
      out += ch;
    } else if (/^[A-Z]$/.test(ch)) {
      out += `_${ch.toLowerCase()}`;
    } else {
      const code = ch.codePointAt(0) ?? 0;
      out += `__${code.toString(16)}_`;
    }
  }
  return out;
};

/**
 * Lower-case a package name and replace characters that cannot appear in an
 * identifier. Not injective; only used where a single package is in play.
 */
export const sanitizePackageName = (name: string): string =>
  name.toLowerCase().replace(/[^a-z0-9_]/g, "_");

export const trampolineIdentifier = (
  packageName: string,
  unitPath: string
): string =>
  `${TRAMPOLINE_PREFIX}_${sanitizePackageName(packageName)}_${encodeIdentifierPart(basename(unitPath))}`;

/**
 * Derive one trampoline per unit, failing on the first identifier shared by
 * two listed units.
 */
export const deriveTrampolines = (
  packageName: string,
  unitPaths: readonly string[]
): Result<readonly Trampoline[], string> => {
  const owners = new Map<string, string>();
  const trampolines: Trampoline[] = [];

  for (const unitPath of unitPaths) {
    const identifier = trampolineIdentifier(packageName, unitPath);
    const owner = owners.get(identifier);
    if (owner !== undefined) {
      return {
        ok: false,
        error:
          `Forced-linkage identifier collision: '${identifier}' is derived from both\n` +
          `- ${owner}\n` +
          `- ${unitPath}\n` +
          `Rename one of the files or remove the duplicate entry from the forced-linkage list.`,
      };
    }
    owners.set(identifier, unitPath);
    trampolines.push({ identifier, unitPath });
  }

  return { ok: true, value: trampolines };
};

/**
 * A package name, version or configuration. Each becomes part of a single
 * directory name, so path separators and whitespace are excluded.
 */
export const PACKAGE_COMPONENT = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

export const validatePackageComponents = (
  descriptor: Pick<PackageDescriptor, "name" | "version" | "configuration">
): Result<void, string> => {
  const { name, version, configuration } = descriptor;
  if (!PACKAGE_COMPONENT.test(name)) {
    return { ok: false, error: `Invalid package name '${name}'` };
  }
  if (version !== undefined && !PACKAGE_COMPONENT.test(version)) {
    return { ok: false, error: `Invalid version '${version}'` };
  }
  if (!PACKAGE_COMPONENT.test(configuration)) {
    return { ok: false, error: `Invalid configuration '${configuration}'` };
  }
  return { ok: true, value: undefined };
};

/**
 * `<name>[-<version>]-<configuration>`
 */
export const packageDirectoryName = (
  descriptor: Pick<PackageDescriptor, "name" | "version" | "configuration">
): string => {
  const { name, version, configuration } = descriptor;
  return version
    ? `${name}-${version}-${configuration}`
    : `${name}-${configuration}`;
};
