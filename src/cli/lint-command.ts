import fs from "node:fs/promises";
import { lintFile } from "../analysis/analyze-file.js";
import { createYrCompiler } from "../analysis/compiler.js";
import { loadVocabularyWithOverrides } from "../config/vocabulary-loader.js";
import { discoverRuleFiles } from "../ingest/file-discovery.js";
import type { AnalysisResult } from "../issues/types.js";
import { createLintEngine } from "../lint/engine.js";
import { buildLintReport, renderJsonReport } from "../report/json-reporter.js";
import { renderSarifReport } from "../report/sarif-reporter.js";
import { lintExitCode } from "../report/summary.js";
import { renderLintText } from "../report/text-reporter.js";
import { resolveVocabularyDirectory } from "./runtime-paths.js";

export type LintFormat = "text" | "json" | "sarif";

export interface LintOptions {
  readonly target: string;
  readonly format: LintFormat;
  readonly strict?: boolean;
  readonly color?: boolean;
  readonly compiler?: string;
  readonly vocabularyDir?: string;
  readonly out?: string;
}

export interface LintCommandResult {
  readonly results: readonly AnalysisResult[];
  readonly output: string;
  readonly exitCode: number;
}

export async function runLintCommand(
  options: LintOptions,
  toolVersion: string,
): Promise<LintCommandResult> {
  const vocabulary = await loadVocabularyWithOverrides({
    baseDir: await resolveVocabularyDirectory(),
    overrideDir: options.vocabularyDir,
  });
  const engine = createLintEngine(vocabulary.lint);
  const compiler = options.compiler
    ? createYrCompiler(options.compiler)
    : undefined;

  const files = await discoverRuleFiles(options.target);
  const results: AnalysisResult[] = [];
  for (const file of files) {
    results.push(await lintFile(file.absolutePath, engine, { compiler }));
  }

  const output = buildOutput(results, options, toolVersion);
  if (options.out) {
    await fs.writeFile(options.out, output, "utf8");
  }

  return {
    results,
    output,
    exitCode: lintExitCode(results, options.strict ?? false),
  };
}

function buildOutput(
  results: readonly AnalysisResult[],
  options: LintOptions,
  toolVersion: string,
): string {
  if (options.format === "json") {
    return renderJsonReport(buildLintReport(results, toolVersion));
  }
  if (options.format === "sarif") {
    return renderSarifReport(results, toolVersion);
  }
  return results
    .map((result) => renderLintText(result, { color: options.color }))
    .filter((block) => block.length > 0)
    .join("\n\n");
}
