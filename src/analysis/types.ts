import type { RuleAtomReport } from "../atoms/types.js";
import type { AnalysisResult } from "../issues/types.js";

export type CompileOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly message: string };

export interface RuleCompiler {
  compile(source: string): Promise<CompileOutcome>;
}

export interface AtomAnalysisResult extends AnalysisResult {
  readonly rules: readonly RuleAtomReport[];
}

export interface FileAnalysisOptions {
  readonly compiler?: RuleCompiler;
}
