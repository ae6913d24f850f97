import { createIssue } from "../../issues/issue-factory.js";
import { Severity } from "../../issues/types.js";
import type { Issue } from "../../issues/types.js";
import { hasModifier } from "../../parser/string-definitions.js";
import { decodeTextLiteral } from "../../parser/text-literal.js";
import type { ParsedRule } from "../../parser/types.js";

const NOCASE_MAX_CHARS = 20;

export function checkStringModifiers(rule: ParsedRule): Issue[] {
  const issues: Issue[] = [];

  for (const definition of rule.strings) {
    const details = { line: definition.line };
    const value =
      definition.kind === "text"
        ? decodeTextLiteral(definition.rawValue).text
        : definition.rawValue;

    if (hasModifier(definition, "nocase") && value.length > NOCASE_MAX_CHARS) {
      issues.push(
        createIssue(
          rule.name,
          Severity.Info,
          "I003",
          `String ${definition.id} uses 'nocase' on long string; performance impact`,
          details,
        ),
      );
    }

    const xorRanged = definition.modifiers.some((modifier) =>
      modifier.startsWith("xor("),
    );
    if (hasModifier(definition, "xor") && !xorRanged) {
      issues.push(
        createIssue(
          rule.name,
          Severity.Info,
          "I004",
          `String ${definition.id} uses 'xor' without range; generates 255 patterns`,
          details,
        ),
      );
    }
  }

  return issues;
}
