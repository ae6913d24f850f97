import { createIssue } from "../../issues/issue-factory.js";
import { Severity } from "../../issues/types.js";
import type { Issue } from "../../issues/types.js";
import {
  concreteByteCount,
  decodeHexPattern,
  hexTokens,
} from "../../parser/hex-pattern.js";
import { hasModifier } from "../../parser/string-definitions.js";
import { decodeTextLiteral } from "../../parser/text-literal.js";
import type { ParsedRule, ParsedString } from "../../parser/types.js";
import type { LintVocabulary } from "../types.js";

const MIN_ATOM_BYTES = 4;
const BASE64_MIN_CHARS = 3;
const UNESCAPED_BRACE = /(?<!\\)\{(?![0-9])/;
const UNBOUNDED_QUANTIFIER = /(?<!\\)\.[*+](?!\?)/;

export function checkStrings(
  rule: ParsedRule,
  vocabulary: LintVocabulary,
): Issue[] {
  return rule.strings.flatMap((definition) => {
    switch (definition.kind) {
      case "text":
        return checkTextString(rule, definition, vocabulary);
      case "byte":
        return checkHexString(rule, definition);
      case "regex":
        return checkRegexString(rule, definition);
      default:
        return [];
    }
  });
}

function checkTextString(
  rule: ParsedRule,
  definition: ParsedString,
  vocabulary: LintVocabulary,
): Issue[] {
  const issues: Issue[] = [];
  const { text, bytes } = decodeTextLiteral(definition.rawValue);

  if (bytes.length < MIN_ATOM_BYTES) {
    issues.push(
      issueFor(
        rule,
        definition,
        Severity.Error,
        "E002",
        `String ${definition.id} is only ${bytes.length} bytes; minimum 4 bytes for good atoms`,
      ),
    );
  }

  const lowered = text.toLowerCase();
  for (const term of vocabulary.fpProneStrings) {
    if (lowered.includes(term.toLowerCase())) {
      issues.push(
        issueFor(
          rule,
          definition,
          Severity.Warning,
          "W005",
          `String ${definition.id} contains FP-prone pattern '${term}'`,
        ),
      );
    }
  }

  const base64 =
    hasModifier(definition, "base64") || hasModifier(definition, "base64wide");
  const charCount = [...text].length;
  if (base64 && charCount < BASE64_MIN_CHARS) {
    issues.push(
      issueFor(
        rule,
        definition,
        Severity.Error,
        "E006",
        `String ${definition.id} uses 'base64' but is only ${charCount} chars; YARA-X requires 3+ characters for base64 modifier`,
      ),
    );
  }

  return issues;
}

function checkHexString(rule: ParsedRule, definition: ParsedString): Issue[] {
  const issues: Issue[] = [];
  const concrete = concreteByteCount(decodeHexPattern(definition.rawValue));

  if (concrete < MIN_ATOM_BYTES) {
    issues.push(
      issueFor(
        rule,
        definition,
        Severity.Error,
        "E003",
        `Hex string ${definition.id} has only ${concrete} bytes; minimum 4 for good atoms`,
      ),
    );
  }

  if (hexTokens(definition.rawValue)[0] === "??") {
    issues.push(
      issueFor(
        rule,
        definition,
        Severity.Warning,
        "W006",
        `Hex string ${definition.id} starts with wildcard; move fixed bytes first for better atoms`,
      ),
    );
  }

  return issues;
}

function checkRegexString(rule: ParsedRule, definition: ParsedString): Issue[] {
  const issues: Issue[] = [];

  if (UNESCAPED_BRACE.test(definition.rawValue)) {
    issues.push(
      issueFor(
        rule,
        definition,
        Severity.Error,
        "E007",
        `Regex ${definition.id} has unescaped '{'; YARA-X requires escaping as '\\{'`,
      ),
    );
  }

  if (UNBOUNDED_QUANTIFIER.test(definition.rawValue)) {
    issues.push(
      issueFor(
        rule,
        definition,
        Severity.Warning,
        "W008",
        `Regex ${definition.id} has unbounded quantifier (.*/.+); use bounded quantifiers {1,N}`,
      ),
    );
  }

  return issues;
}

function issueFor(
  rule: ParsedRule,
  definition: ParsedString,
  severity: Severity,
  code: string,
  message: string,
): Issue {
  return createIssue(rule.name, severity, code, message, {
    line: definition.line,
  });
}
