import { COMPILATION_SCOPE, Severity } from "./types.js";
import type { Issue } from "./types.js";

export interface IssueDetails {
  readonly suggestion?: string;
  readonly line?: number;
}

export function createIssue(
  scope: string,
  severity: Severity,
  code: string,
  message: string,
  details: IssueDetails = {},
): Issue {
  return {
    scope,
    severity,
    code,
    message,
    ...(details.suggestion !== undefined
      ? { suggestion: details.suggestion }
      : {}),
    ...(details.line !== undefined ? { line: details.line } : {}),
  };
}

export function createCompilationIssue(message: string): Issue {
  return createIssue(
    COMPILATION_SCOPE,
    Severity.Error,
    "E000",
    `YARA-X compilation error: ${message}`,
  );
}

export function countBySeverity(
  issues: readonly Issue[],
  severity: Severity,
): number {
  return issues.filter((issue) => issue.severity === severity).length;
}
