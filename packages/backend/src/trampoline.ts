/**
 * Objective-C text of a forced-linkage trampoline.
 *
 * The source mutator appends `renderTrampolineBlock` to each unit and the
 * bootstrap emitter repeats `renderTrampolineDeclaration` for the same
 * identifier. Both go through this module so the two copies cannot drift.
 */

export const BLOCK_BEGIN = "// archpack:forcelink begin";
export const BLOCK_END = "// archpack:forcelink end";

export const TRAMPOLINE_METHOD = "touch";

export const renderTrampolineDeclaration = (identifier: string): string =>
  `@interface ${identifier} : NSObject
+ (void)${TRAMPOLINE_METHOD};
@end
`;

export const renderTrampolineBlock = (identifier: string): string =>
  `${BLOCK_BEGIN}
${renderTrampolineDeclaration(identifier)}@implementation ${identifier}
+ (void)${TRAMPOLINE_METHOD} {}
@end
${BLOCK_END}
`;

/**
 * Text appended after a unit's original content. A unit without a trailing
 * newline gets one first so its last line stays intact.
 */
export const trampolineSuffix = (original: string, identifier: string): string => {
  const separator = original.length === 0 || original.endsWith("\n") ? "" : "\n";
  return `${separator}\n${renderTrampolineBlock(identifier)}`;
};

export const appendTrampoline = (original: string, identifier: string): string =>
  original + trampolineSuffix(original, identifier);

export const containsTrampolineBlock = (content: string): boolean =>
  content.includes(BLOCK_BEGIN) && content.includes(BLOCK_END);
