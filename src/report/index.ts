export {
  buildAtomReport,
  buildLintReport,
  renderJsonReport,
} from "./json-reporter.js";
export { renderAtomText, renderLintText } from "./text-reporter.js";
export { renderSarifReport } from "./sarif-reporter.js";
export { atomExitCode, lintExitCode, summarizeResults } from "./summary.js";
export type {
  AtomReport,
  AtomTextRenderOptions,
  JsonFileResult,
  JsonIssue,
  LintReport,
  ResultSummary,
  TextRenderOptions,
  ToolInfo,
} from "./types.js";
