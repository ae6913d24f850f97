import type { AtomAnalysisResult } from "../analysis/types.js";
import { COMPILATION_SCOPE, Severity } from "../issues/types.js";
import type { AnalysisResult, Issue } from "../issues/types.js";
import type { AtomTextRenderOptions, TextRenderOptions } from "./types.js";

interface Palette {
  readonly red: string;
  readonly yellow: string;
  readonly blue: string;
  readonly bold: string;
  readonly reset: string;
}

const ANSI: Palette = {
  red: "\u001b[91m",
  yellow: "\u001b[93m",
  blue: "\u001b[94m",
  bold: "\u001b[1m",
  reset: "\u001b[0m",
};

const PLAIN: Palette = { red: "", yellow: "", blue: "", bold: "", reset: "" };

export function renderLintText(
  result: AnalysisResult,
  options: TextRenderOptions = {},
): string {
  const palette = options.color ? ANSI : PLAIN;
  const lines: string[] = [];

  if (result.parseError) {
    lines.push(`${palette.bold}${result.filePath}${palette.reset}`);
    lines.push(`  ${palette.red}ERROR${palette.reset}: ${result.parseError}`);
    return lines.join("\n");
  }

  if (result.issues.length === 0) {
    return "";
  }

  lines.push(`${palette.bold}${result.filePath}${palette.reset}`);
  for (const issue of result.issues) {
    const color = severityColor(issue, palette);
    const lineInfo = issue.line ? `:${issue.line}` : "";
    lines.push(
      `  ${color}${issue.severity.toUpperCase()}${palette.reset} [${issue.code}] ${issue.scope}${lineInfo}: ${issue.message}`,
    );
  }
  return lines.join("\n");
}

export function renderAtomText(
  result: AtomAnalysisResult,
  options: AtomTextRenderOptions = {},
): string {
  const palette = options.color ? ANSI : PLAIN;
  const verbose = options.verbose ?? false;
  const lines: string[] = [];

  if (result.parseError) {
    return `${palette.red}ERROR${palette.reset} ${result.filePath}: ${result.parseError}`;
  }

  for (const issue of result.issues) {
    if (issue.scope === COMPILATION_SCOPE) {
      lines.push(
        `${palette.red}${issue.message}${palette.reset} (${result.filePath})`,
      );
    }
  }

  for (const rule of result.rules) {
    const ruleHasIssues = rule.strings.some((entry) => entry.issues.length > 0);
    if (!ruleHasIssues && !verbose) {
      continue;
    }

    lines.push("");
    lines.push(`${palette.bold}${rule.rule}${palette.reset}`);
    for (const entry of rule.strings) {
      if (entry.issues.length === 0 && !verbose) {
        continue;
      }
      if (verbose) {
        const atomInfo = entry.bestAtom ? ` [atom: ${entry.bestAtom}]` : "";
        lines.push(`  ${entry.stringId}: ${entry.byteCount} bytes${atomInfo}`);
      }
      for (const issue of entry.issues) {
        const color = severityColor(issue, palette);
        lines.push(
          `    ${color}${issue.severity.toUpperCase()}${palette.reset}: ${issue.message}`,
        );
        if (issue.suggestion) {
          lines.push(`           Suggestion: ${issue.suggestion}`);
        }
      }
    }
  }

  const hasStringIssues = result.rules.some((rule) =>
    rule.strings.some((entry) => entry.issues.length > 0),
  );
  if (!hasStringIssues) {
    lines.push("");
    lines.push(`All strings in ${result.filePath} have good atom quality`);
  }

  return lines.join("\n");
}

function severityColor(issue: Issue, palette: Palette): string {
  switch (issue.severity) {
    case Severity.Error:
      return palette.red;
    case Severity.Warning:
      return palette.yellow;
    default:
      return palette.blue;
  }
}
