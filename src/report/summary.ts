import type { AtomAnalysisResult } from "../analysis/types.js";
import { countBySeverity } from "../issues/issue-factory.js";
import { Severity } from "../issues/types.js";
import type { AnalysisResult } from "../issues/types.js";
import type { ResultSummary } from "./types.js";

export function summarizeResults(
  results: readonly AnalysisResult[],
): ResultSummary {
  const summary: ResultSummary = {
    files: results.length,
    parse_errors: 0,
    errors: 0,
    warnings: 0,
    info: 0,
  };

  for (const result of results) {
    if (result.parseError) {
      summary.parse_errors += 1;
    }
    summary.errors += countBySeverity(result.issues, Severity.Error);
    summary.warnings += countBySeverity(result.issues, Severity.Warning);
    summary.info += countBySeverity(result.issues, Severity.Info);
  }

  return summary;
}

export function lintExitCode(
  results: readonly AnalysisResult[],
  strict = false,
): number {
  const summary = summarizeResults(results);
  if (summary.parse_errors > 0 || summary.errors > 0) {
    return 1;
  }
  if (strict && summary.warnings > 0) {
    return 1;
  }
  return 0;
}

export function atomExitCode(results: readonly AtomAnalysisResult[]): number {
  const failed = results.some(
    (result) =>
      Boolean(result.parseError) ||
      result.rules.some((rule) =>
        rule.strings.some((entry) => entry.issues.length > 0),
      ),
  );
  return failed ? 1 : 0;
}
