import type { Issue } from "../issues/types.js";
import type { ParsedRule } from "../parser/types.js";

export interface DeprecatedFeature {
  readonly name: string;
  readonly message: string;
}

export interface LintVocabulary {
  readonly categoryPrefixes: readonly string[];
  readonly fpProneStrings: readonly string[];
  readonly deprecatedFeatures: readonly DeprecatedFeature[];
}

export type LintCheck = (
  rule: ParsedRule,
  vocabulary: LintVocabulary,
) => Issue[];
