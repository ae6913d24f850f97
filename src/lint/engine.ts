import type { Issue } from "../issues/types.js";
import type { ParsedRule } from "../parser/types.js";
import { checkCondition } from "./checks/condition.js";
import { checkMetadata } from "./checks/metadata.js";
import { checkStringModifiers } from "./checks/modifiers.js";
import { checkNamingConvention } from "./checks/naming.js";
import { checkStrings } from "./checks/strings.js";
import type { LintCheck, LintVocabulary } from "./types.js";

const CHECKS: readonly LintCheck[] = [
  checkNamingConvention,
  checkMetadata,
  checkStrings,
  checkStringModifiers,
  checkCondition,
];

export interface LintEngine {
  readonly vocabulary: LintVocabulary;
  lintRule(rule: ParsedRule): Issue[];
  lintRules(rules: readonly ParsedRule[]): Issue[];
}

export function createLintEngine(vocabulary: LintVocabulary): LintEngine {
  const lintRule = (rule: ParsedRule): Issue[] =>
    CHECKS.flatMap((check) => check(rule, vocabulary));

  return {
    vocabulary,
    lintRule,
    lintRules: (rules) => rules.flatMap(lintRule),
  };
}
