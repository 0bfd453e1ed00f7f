/**
 * Companion compilation unit that references every trampoline
 */

import { sanitizePackageName } from "./identifiers.js";
import { renderTrampolineDeclaration, TRAMPOLINE_METHOD } from "./trampoline.js";
import type { EmbedMode, Trampoline } from "./types.js";

export const bootstrapFileName = (packageName: string): string =>
  `${packageName}_bootstrap.m`;

export const bootstrapFunctionName = (packageName: string): string =>
  `${sanitizePackageName(packageName)}_archpack_bootstrap`;

/**
 * Generate the bootstrap unit. The consumer compiles it into its own target,
 * so its references into the static library survive dead-code stripping.
 */
export const generateBootstrapSource = (
  packageName: string,
  trampolines: readonly Trampoline[]
): string => {
  const declarations = trampolines
    .map((t) => `// ${t.unitPath}\n${renderTrampolineDeclaration(t.identifier)}`)
    .join("\n");
  const calls = trampolines
    .map((t) => `    [${t.identifier} ${TRAMPOLINE_METHOD}];`)
    .join("\n");
  const fn = bootstrapFunctionName(packageName);

  return `// Generated by archpack for ${packageName}. Add this file to the consuming target.
#import <Foundation/Foundation.h>

${declarations}
void ${fn}(void);

void ${fn}(void)
{
${calls}
}
`;
};

/**
 * Bootstrap unit for a package, or undefined when none is needed: embedded
 * sources are compiled by the consumer in full, and without forced-linkage
 * units there is nothing to reference.
 */
export const emitBootstrap = (
  packageName: string,
  trampolines: readonly Trampoline[],
  embed: EmbedMode
): { readonly fileName: string; readonly content: string } | undefined => {
  if (embed !== "binary" || trampolines.length === 0) return undefined;
  return {
    fileName: bootstrapFileName(packageName),
    content: generateBootstrapSource(packageName, trampolines),
  };
};
