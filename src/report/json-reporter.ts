import type { AtomAnalysisResult } from "../analysis/types.js";
import type { AnalysisResult, Issue } from "../issues/types.js";
import { summarizeResults } from "./summary.js";
import type {
  AtomReport,
  JsonAtomFileResult,
  JsonFileResult,
  JsonIssue,
  LintReport,
} from "./types.js";

export function buildLintReport(
  results: readonly AnalysisResult[],
  toolVersion: string,
): LintReport {
  return {
    tool: { name: "atomlint", version: toolVersion },
    summary: summarizeResults(results),
    results: results.map(toJsonFileResult),
  };
}

export function buildAtomReport(
  results: readonly AtomAnalysisResult[],
  toolVersion: string,
): AtomReport {
  return {
    tool: { name: "atomlint", version: toolVersion },
    summary: summarizeResults(results),
    results: results.map(toJsonAtomFileResult),
  };
}

export function renderJsonReport(report: LintReport | AtomReport): string {
  return JSON.stringify(report, null, 2);
}

function toJsonFileResult(result: AnalysisResult): JsonFileResult {
  return {
    file: result.filePath,
    parse_error: result.parseError ?? null,
    issues: result.issues.map(toJsonIssue),
  };
}

function toJsonAtomFileResult(result: AtomAnalysisResult): JsonAtomFileResult {
  return {
    ...toJsonFileResult(result),
    rules: result.rules.map((rule) => ({
      rule: rule.rule,
      strings: rule.strings.map((entry) => ({
        string_id: entry.stringId,
        kind: entry.kind,
        line: entry.line,
        byte_count: entry.byteCount,
        best_atom: entry.bestAtom,
        score: entry.score,
      })),
    })),
  };
}

function toJsonIssue(issue: Issue): JsonIssue {
  return {
    rule: issue.scope,
    severity: issue.severity,
    code: issue.code,
    message: issue.message,
    suggestion: issue.suggestion ?? null,
    line: issue.line ?? null,
  };
}
