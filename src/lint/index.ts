export { createLintEngine } from "./engine.js";
export type { LintEngine } from "./engine.js";
export { checkNamingConvention } from "./checks/naming.js";
export { checkMetadata } from "./checks/metadata.js";
export { checkStrings } from "./checks/strings.js";
export { checkStringModifiers } from "./checks/modifiers.js";
export { checkCondition } from "./checks/condition.js";
export type { DeprecatedFeature, LintCheck, LintVocabulary } from "./types.js";
