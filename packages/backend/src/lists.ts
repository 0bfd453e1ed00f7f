/**
 * Plain-text list files: public headers, forced-linkage units, dependencies
 */

import { existsSync, readFileSync } from "node:fs";
import { PACKAGE_COMPONENT } from "./identifiers.js";
import type { DependencyDeclaration, Result } from "./types.js";

const meaningfulLines = (text: string): { readonly line: string; readonly number: number }[] =>
  text
    .split(/\r?\n/)
    .map((raw, index) => ({ line: raw.replace(/#.*$/, "").trim(), number: index + 1 }))
    .filter((l) => l.line.length > 0);

/**
 * One relative path per line. Duplicates keep their first occurrence.
 */
export const parsePathList = (text: string): readonly string[] => {
  const seen = new Set<string>();
  const paths: string[] = [];
  for (const { line } of meaningfulLines(text)) {
    const path = line.replace(/\\/g, "/").replace(/^\.\//, "");
    if (seen.has(path)) continue;
    seen.add(path);
    paths.push(path);
  }
  return paths;
};

/**
 * One declaration per line: `name`, `name version` or `name@version`
 */
export const parseDependencyList = (
  text: string
): Result<readonly DependencyDeclaration[], string> => {
  const declarations: DependencyDeclaration[] = [];
  const seen = new Map<string, number>();

  for (const { line, number } of meaningfulLines(text)) {
    const tokens = line.split(/\s+/);
    const [first, second, ...rest] = tokens;
    if (!first || rest.length > 0) {
      return { ok: false, error: `Line ${number}: expected 'name [version]', got '${line}'` };
    }

    let name = first;
    let version = second;
    const at = first.indexOf("@");
    if (at > 0 && second === undefined) {
      name = first.slice(0, at);
      version = first.slice(at + 1);
    }

    if (!PACKAGE_COMPONENT.test(name)) {
      return { ok: false, error: `Line ${number}: invalid package name '${name}'` };
    }
    if (version !== undefined && !PACKAGE_COMPONENT.test(version)) {
      return { ok: false, error: `Line ${number}: invalid version '${version}' for '${name}'` };
    }

    const previous = seen.get(name);
    if (previous !== undefined) {
      return {
        ok: false,
        error: `Line ${number}: '${name}' is already declared on line ${previous}`,
      };
    }
    seen.set(name, number);
    declarations.push(version === undefined ? { name } : { name, version });
  }

  return { ok: true, value: declarations };
};

/**
 * Read a list file. `required` lists must exist; optional ones read as empty.
 */
export const readListFile = (
  path: string,
  required: boolean
): Result<string, string> => {
  if (!existsSync(path)) {
    return required
      ? { ok: false, error: `List file not found: ${path}` }
      : { ok: true, value: "" };
  }
  try {
    return { ok: true, value: readFileSync(path, "utf-8") };
  } catch (error) {
    return {
      ok: false,
      error: `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};
