import { createAtomQualityEngine, atomIssues } from "../atoms/quality-engine.js";
import type { AtomScorer } from "../atoms/types.js";
import { createCompilationIssue } from "../issues/issue-factory.js";
import type { AnalysisResult, Issue } from "../issues/types.js";
import type { LintEngine } from "../lint/engine.js";
import { parseRuleSource } from "../parser/rule-parser.js";
import type { AtomAnalysisResult, CompileOutcome } from "./types.js";

export function lintSource(
  source: string,
  filePath: string,
  engine: LintEngine,
  compileOutcome?: CompileOutcome,
): AnalysisResult {
  const issues: Issue[] = compilationIssues(compileOutcome);
  issues.push(...engine.lintRules(parseRuleSource(source)));
  return { filePath, issues };
}

export function analyzeAtomsInSource(
  source: string,
  filePath: string,
  scorer: AtomScorer,
  compileOutcome?: CompileOutcome,
): AtomAnalysisResult {
  const engine = createAtomQualityEngine(scorer);
  const rules = parseRuleSource(source).map((rule) => engine.analyzeRule(rule));
  const issues = [...compilationIssues(compileOutcome), ...atomIssues(rules)];
  return { filePath, issues, rules };
}

function compilationIssues(outcome: CompileOutcome | undefined): Issue[] {
  if (!outcome || outcome.ok) {
    return [];
  }
  return [createCompilationIssue(outcome.message)];
}
