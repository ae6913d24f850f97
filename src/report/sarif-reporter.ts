import { Severity } from "../issues/types.js";
import type { AnalysisResult, Issue } from "../issues/types.js";

type SarifLevel = "error" | "warning" | "note";

const PARSE_ERROR_RULE = "parse-error";

interface SarifRule {
  readonly id: string;
  readonly name: string;
  readonly shortDescription: { readonly text: string };
}

interface SarifResult {
  readonly ruleId: string;
  readonly level: SarifLevel;
  readonly message: { readonly text: string };
  readonly locations: readonly {
    readonly physicalLocation: {
      readonly artifactLocation: { readonly uri: string };
      readonly region: { readonly startLine: number };
    };
  }[];
  readonly properties?: Record<string, string>;
}

interface SarifLog {
  readonly version: "2.1.0";
  readonly $schema: string;
  readonly runs: readonly {
    readonly tool: {
      readonly driver: {
        readonly name: string;
        readonly version: string;
        readonly rules: readonly SarifRule[];
      };
    };
    readonly results: readonly SarifResult[];
  }[];
}

export function renderSarifReport(
  results: readonly AnalysisResult[],
  toolVersion: string,
): string {
  const rules: SarifRule[] = [];
  const seen = new Set<string>();
  const sarifResults: SarifResult[] = [];

  for (const result of results) {
    if (result.parseError) {
      if (!seen.has(PARSE_ERROR_RULE)) {
        seen.add(PARSE_ERROR_RULE);
        rules.push(buildRule(PARSE_ERROR_RULE, "Rule file could not be read"));
      }
      sarifResults.push(
        buildResult(PARSE_ERROR_RULE, "error", result.parseError, result.filePath, 1),
      );
      continue;
    }

    for (const issue of result.issues) {
      if (!seen.has(issue.code)) {
        seen.add(issue.code);
        rules.push(buildRule(issue.code, issue.message));
      }
      sarifResults.push(issueResult(issue, result.filePath));
    }
  }

  const sarif: SarifLog = {
    version: "2.1.0",
    $schema: "https://json.schemastore.org/sarif-2.1.0.json",
    runs: [
      {
        tool: { driver: { name: "atomlint", version: toolVersion, rules } },
        results: sarifResults,
      },
    ],
  };
  return JSON.stringify(sarif, null, 2);
}

function buildRule(code: string, description: string): SarifRule {
  return { id: code, name: code, shortDescription: { text: description } };
}

function issueResult(issue: Issue, filePath: string): SarifResult {
  const result = buildResult(
    issue.code,
    toSarifLevel(issue.severity),
    `${issue.scope}: ${issue.message}`,
    filePath,
    issue.line ?? 1,
  );
  return {
    ...result,
    properties: {
      rule: issue.scope,
      ...(issue.suggestion ? { suggestion: issue.suggestion } : {}),
    },
  };
}

function buildResult(
  ruleId: string,
  level: SarifLevel,
  text: string,
  uri: string,
  startLine: number,
): SarifResult {
  return {
    ruleId,
    level,
    message: { text },
    locations: [
      {
        physicalLocation: {
          artifactLocation: { uri },
          region: { startLine },
        },
      },
    ],
  };
}

function toSarifLevel(severity: Issue["severity"]): SarifLevel {
  switch (severity) {
    case Severity.Error:
      return "error";
    case Severity.Warning:
      return "warning";
    default:
      return "note";
  }
}
