export { analyzeAtomsInSource, lintSource } from "./analyze-source.js";
export { analyzeAtomsInFile, lintFile, readRuleSource } from "./analyze-file.js";
export { createYrCompiler } from "./compiler.js";
export type {
  AtomAnalysisResult,
  CompileOutcome,
  FileAnalysisOptions,
  RuleCompiler,
} from "./types.js";
