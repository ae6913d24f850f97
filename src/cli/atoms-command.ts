import { analyzeAtomsInFile } from "../analysis/analyze-file.js";
import { createYrCompiler } from "../analysis/compiler.js";
import type { AtomAnalysisResult } from "../analysis/types.js";
import { createAtomScorer } from "../atoms/atom-scorer.js";
import { loadVocabularyWithOverrides } from "../config/vocabulary-loader.js";
import { discoverRuleFiles } from "../ingest/file-discovery.js";
import { buildAtomReport, renderJsonReport } from "../report/json-reporter.js";
import { atomExitCode } from "../report/summary.js";
import { renderAtomText } from "../report/text-reporter.js";
import { resolveVocabularyDirectory } from "./runtime-paths.js";

export type AtomFormat = "text" | "json";

export interface AtomOptions {
  readonly target: string;
  readonly format: AtomFormat;
  readonly verbose?: boolean;
  readonly color?: boolean;
  readonly compiler?: string;
  readonly vocabularyDir?: string;
}

export interface AtomCommandResult {
  readonly results: readonly AtomAnalysisResult[];
  readonly output: string;
  readonly exitCode: number;
}

export async function runAtomsCommand(
  options: AtomOptions,
  toolVersion: string,
): Promise<AtomCommandResult> {
  const vocabulary = await loadVocabularyWithOverrides({
    baseDir: await resolveVocabularyDirectory(),
    overrideDir: options.vocabularyDir,
  });
  const scorer = createAtomScorer(vocabulary.atoms);
  const compiler = options.compiler
    ? createYrCompiler(options.compiler)
    : undefined;

  const files = await discoverRuleFiles(options.target);
  const results: AtomAnalysisResult[] = [];
  for (const file of files) {
    results.push(
      await analyzeAtomsInFile(file.absolutePath, scorer, { compiler }),
    );
  }

  const output =
    options.format === "json"
      ? renderJsonReport(buildAtomReport(results, toolVersion))
      : results
          .map((result) =>
            renderAtomText(result, {
              color: options.color,
              verbose: options.verbose,
            }),
          )
          .join("\n");

  return { results, output, exitCode: atomExitCode(results) };
}
