import { createIssue } from "../../issues/issue-factory.js";
import { Severity } from "../../issues/types.js";
import type { Issue } from "../../issues/types.js";
import type { ParsedRule } from "../../parser/types.js";
import type { LintVocabulary } from "../types.js";

const NEGATIVE_INDEX = /@\w+\s*\[\s*-\d+\s*\]/;

export function checkCondition(
  rule: ParsedRule,
  vocabulary: LintVocabulary,
): Issue[] {
  const condition = rule.condition;
  if (!condition) {
    return [];
  }

  const issues: Issue[] = [];
  const details = { line: condition.line };
  const lowered = condition.text.toLowerCase();

  for (const feature of vocabulary.deprecatedFeatures) {
    if (lowered.includes(feature.name.toLowerCase())) {
      issues.push(
        createIssue(rule.name, Severity.Warning, "W007", feature.message, details),
      );
    }
  }

  if (NEGATIVE_INDEX.test(condition.text)) {
    issues.push(
      createIssue(
        rule.name,
        Severity.Error,
        "E008",
        "Negative array indexing (e.g., @a[-1]) not supported in YARA-X; use @a[#a - 1] instead",
        { ...details, suggestion: "Use @a[#a - 1] instead" },
      ),
    );
  }

  return issues;
}
