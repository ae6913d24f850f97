import { createIssue } from "../../issues/issue-factory.js";
import { Severity } from "../../issues/types.js";
import type { Issue } from "../../issues/types.js";
import type { ParsedRule } from "../../parser/types.js";
import type { LintVocabulary } from "../types.js";

const MIN_NAME_PARTS = 3;

export function checkNamingConvention(
  rule: ParsedRule,
  vocabulary: LintVocabulary,
): Issue[] {
  const parts = rule.name.split("_");
  if (parts.length < MIN_NAME_PARTS) {
    return [
      createIssue(
        rule.name,
        Severity.Warning,
        "W001",
        `Rule name '${rule.name}' should follow CATEGORY_PLATFORM_FAMILY_DATE format`,
        { line: rule.line },
      ),
    ];
  }

  const prefix = parts[0] ?? "";
  if (vocabulary.categoryPrefixes.includes(prefix)) {
    return [];
  }
  const expected = [...vocabulary.categoryPrefixes].sort().join(", ");
  return [
    createIssue(
      rule.name,
      Severity.Info,
      "I001",
      `Unrecognized category prefix '${prefix}'; expected one of: ${expected}`,
      { line: rule.line },
    ),
  ];
}
