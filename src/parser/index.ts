export { maskLiterals } from "./lexer.js";
export {
  extractRuleBody,
  extractRuleDeclarations,
  extractRuleNames,
} from "./rule-extractor.js";
export { splitSections } from "./sections.js";
export { parseMetadata } from "./metadata.js";
export { hasModifier, parseStringDefinitions } from "./string-definitions.js";
export { decodeTextLiteral } from "./text-literal.js";
export { concreteByteCount, decodeHexPattern, hexTokens } from "./hex-pattern.js";
export { createLineIndex } from "./source-location.js";
export { parseRuleSource } from "./rule-parser.js";
export type { LineIndex } from "./source-location.js";
export type {
  DecodedBytePattern,
  DecodedText,
  Metadata,
  ParsedCondition,
  ParsedRule,
  ParsedString,
  RuleBody,
  RuleDeclaration,
  RuleSections,
  SectionSpan,
  StringDefinition,
  StringKind,
} from "./types.js";
