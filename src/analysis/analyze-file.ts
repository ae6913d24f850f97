import fs from "node:fs/promises";
import type { AtomScorer } from "../atoms/types.js";
import type { AnalysisResult } from "../issues/types.js";
import type { LintEngine } from "../lint/engine.js";
import { analyzeAtomsInSource, lintSource } from "./analyze-source.js";
import type {
  AtomAnalysisResult,
  CompileOutcome,
  FileAnalysisOptions,
} from "./types.js";

type SourceRead =
  | { readonly source: string }
  | { readonly error: string };

export async function lintFile(
  filePath: string,
  engine: LintEngine,
  options: FileAnalysisOptions = {},
): Promise<AnalysisResult> {
  const read = await readRuleSource(filePath);
  if ("error" in read) {
    return { filePath, parseError: read.error, issues: [] };
  }
  const outcome = await compile(read.source, options);
  return lintSource(read.source, filePath, engine, outcome);
}

export async function analyzeAtomsInFile(
  filePath: string,
  scorer: AtomScorer,
  options: FileAnalysisOptions = {},
): Promise<AtomAnalysisResult> {
  const read = await readRuleSource(filePath);
  if ("error" in read) {
    return { filePath, parseError: read.error, issues: [], rules: [] };
  }
  const outcome = await compile(read.source, options);
  return analyzeAtomsInSource(read.source, filePath, scorer, outcome);
}

export async function readRuleSource(filePath: string): Promise<SourceRead> {
  try {
    const buffer = await fs.readFile(filePath);
    const decoder = new TextDecoder("utf-8", { fatal: true });
    return { source: decoder.decode(buffer) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { error: `Cannot read file: ${message}` };
  }
}

async function compile(
  source: string,
  options: FileAnalysisOptions,
): Promise<CompileOutcome | undefined> {
  return options.compiler ? await options.compiler.compile(source) : undefined;
}
