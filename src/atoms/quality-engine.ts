import { createIssue } from "../issues/issue-factory.js";
import { Severity } from "../issues/types.js";
import type { Issue } from "../issues/types.js";
import { decodeHexPattern } from "../parser/hex-pattern.js";
import { hasModifier } from "../parser/string-definitions.js";
import { decodeTextLiteral } from "../parser/text-literal.js";
import type { ParsedRule, ParsedString } from "../parser/types.js";
import { formatAtom } from "./atom-scorer.js";
import { ATOM_LENGTH } from "./types.js";
import type {
  AtomScorer,
  AtomSelection,
  RuleAtomReport,
  StringAtomReport,
} from "./types.js";

const ERROR_SCORE = 30;
const WARNING_SCORE = 60;
const BASE64_MIN_CHARS = 3;
const NOCASE_MAX_BYTES = 15;
const MAX_WILDCARD_RATIO = 0.5;

type AddIssue = (
  severity: Severity,
  code: string,
  message: string,
  suggestion?: string,
) => void;

export interface AtomQualityEngine {
  analyzeRule(rule: ParsedRule): RuleAtomReport;
}

export function createAtomQualityEngine(scorer: AtomScorer): AtomQualityEngine {
  const analyzeText = (rule: ParsedRule, definition: ParsedString) => {
    const { issues, add } = collectIssues(rule, definition);

    const decoded = decodeTextLiteral(definition.rawValue);
    const byteCount = decoded.bytes.length;

    const charCount = [...decoded.text].length;
    if (usesBase64(definition) && charCount < BASE64_MIN_CHARS) {
      add(
        Severity.Error,
        "A002",
        `String ${definition.id} uses 'base64' but is only ${charCount} chars; YARA-X requires 3+ characters for base64 modifier`,
        "Use a string of 3+ characters with base64 modifier",
      );
    }

    if (byteCount < ATOM_LENGTH) {
      add(
        Severity.Error,
        "A001",
        `String ${definition.id} is only ${byteCount} bytes; no valid 4-byte atom possible`,
        "Use a longer string (4+ bytes minimum)",
      );
      return report(definition, byteCount, null, issues);
    }

    const selection = scorer.findBestAtom(decoded.bytes);
    classifyScore(definition, selection, add);

    if (hasModifier(definition, "nocase") && byteCount > NOCASE_MAX_BYTES) {
      add(
        Severity.Info,
        "A008",
        `String ${definition.id} uses 'nocase' on a long string; doubles atom generation`,
        "Consider if case-insensitivity is truly needed",
      );
    }

    if (hasModifier(definition, "wide") && hasModifier(definition, "ascii")) {
      const message = hasModifier(definition, "nocase")
        ? `String ${definition.id} combines 'nocase wide ascii'; multiplies atom variants`
        : `String ${definition.id} uses 'wide ascii'; doubles matching, ensure both encodings are needed`;
      add(Severity.Info, "A009", message);
    }

    return report(definition, byteCount, selection, issues);
  };

  const analyzeHex = (rule: ParsedRule, definition: ParsedString) => {
    const { issues, add } = collectIssues(rule, definition);

    const pattern = decodeHexPattern(definition.rawValue);
    const byteCount = pattern.bytes.length;
    const wildcards = pattern.wildcardOffsets;

    if (byteCount < ATOM_LENGTH) {
      add(
        Severity.Error,
        "A001",
        `Hex string ${definition.id} is only ${byteCount} bytes; no valid 4-byte atom possible`,
        "Use a longer hex pattern (4+ bytes minimum)",
      );
      return report(definition, byteCount, null, issues);
    }

    if (wildcards.has(0) && wildcards.has(1)) {
      add(
        Severity.Warning,
        "A006",
        `Hex string ${definition.id} starts with wildcards; atoms will be extracted from middle/end`,
        "Move fixed bytes to the beginning if possible",
      );
    }

    const ratio = wildcards.size / byteCount;
    if (ratio > MAX_WILDCARD_RATIO) {
      add(
        Severity.Warning,
        "A007",
        `Hex string ${definition.id} has high wildcard density (${Math.round(ratio * 100)}%); may limit atom options`,
      );
    }

    const selection = scorer.findBestAtom(pattern.bytes, wildcards);
    if (selection.candidates === 0) {
      add(
        Severity.Error,
        "A003",
        `Hex string ${definition.id} has no valid 4-byte atom (too many wildcards)`,
        "Reduce wildcards or add fixed byte sequences",
      );
    } else {
      classifyScore(definition, selection, add);
    }

    return report(definition, byteCount, selection, issues);
  };

  return {
    analyzeRule(rule: ParsedRule): RuleAtomReport {
      const strings: StringAtomReport[] = [];
      for (const definition of rule.strings) {
        if (definition.kind === "text") {
          strings.push(analyzeText(rule, definition));
        } else if (definition.kind === "byte") {
          strings.push(analyzeHex(rule, definition));
        }
      }
      return { rule: rule.name, line: rule.line, strings };
    },
  };
}

export function atomIssues(reports: readonly RuleAtomReport[]): Issue[] {
  return reports.flatMap((rule) => rule.strings.flatMap((entry) => entry.issues));
}

function classifyScore(
  definition: ParsedString,
  selection: AtomSelection,
  add: AddIssue,
): void {
  if (selection.score < ERROR_SCORE) {
    add(
      Severity.Error,
      "A004",
      `String ${definition.id} best atom score is ${selection.score}/100; will cause slow scanning`,
      "Choose a more unique string or add distinguishing bytes",
    );
  } else if (selection.score < WARNING_SCORE) {
    add(
      Severity.Warning,
      "A005",
      `String ${definition.id} best atom score is ${selection.score}/100; may cause performance issues`,
    );
  }
}

function collectIssues(
  rule: ParsedRule,
  definition: ParsedString,
): { readonly issues: Issue[]; readonly add: AddIssue } {
  const issues: Issue[] = [];
  const add: AddIssue = (severity, code, message, suggestion) => {
    issues.push(
      createIssue(rule.name, severity, code, message, {
        suggestion,
        line: definition.line,
      }),
    );
  };
  return { issues, add };
}

function usesBase64(definition: ParsedString): boolean {
  return (
    hasModifier(definition, "base64") || hasModifier(definition, "base64wide")
  );
}

function report(
  definition: ParsedString,
  byteCount: number,
  selection: AtomSelection | null,
  issues: readonly Issue[],
): StringAtomReport {
  return {
    stringId: definition.id,
    kind: definition.kind,
    line: definition.line,
    byteCount,
    bestAtom: selection?.atom ? formatAtom(selection.atom.bytes) : null,
    score: selection?.score ?? 0,
    issues,
  };
}
