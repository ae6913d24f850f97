export {
  countBySeverity,
  createCompilationIssue,
  createIssue,
} from "./issue-factory.js";
export type { IssueDetails } from "./issue-factory.js";
export { COMPILATION_SCOPE, Severity } from "./types.js";
export type { AnalysisResult, Issue } from "./types.js";
