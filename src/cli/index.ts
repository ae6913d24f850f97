#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { runAtomsCommand, type AtomFormat } from "./atoms-command.js";
import { runLintCommand, type LintFormat } from "./lint-command.js";
import { resolvePackageRoot } from "./runtime-paths.js";

interface LintCliOptions {
  format: string;
  strict?: boolean;
  color: boolean;
  compiler?: string;
  vocabulary?: string;
  out?: string;
}

interface AtomsCliOptions {
  format: string;
  verbose?: boolean;
  color: boolean;
  compiler?: string;
  vocabulary?: string;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("atomlint")
  .description("Lint YARA rules and check the quality of their atoms")
  .version(toolVersion);

program
  .command("lint")
  .argument("<path>", "Rule file or directory of .yar/.yara files")
  .option("--format <format>", "Output format (text|json|sarif)", "text")
  .option("--strict", "Exit with error on warnings")
  .option("--no-color", "Disable colored output")
  .option("--compiler <binary>", "Validate rules with a YARA-X binary")
  .option("--vocabulary <dir>", "Directory with vocabulary overrides")
  .option("--out <file>", "Write report to file")
  .action(async (target: string, options: LintCliOptions) => {
    try {
      const result = await runLintCommand(
        {
          target,
          format: parseLintFormat(options.format),
          strict: Boolean(options.strict),
          color: useColor(options.color),
          compiler: options.compiler,
          vocabularyDir: options.vocabulary,
          out: options.out,
        },
        toolVersion,
      );

      if (!options.out && result.output.length > 0) {
        await writeStdout(result.output + "\n");
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("atoms")
  .argument("<path>", "Rule file or directory of .yar/.yara files")
  .option("--verbose", "Show every string, including good atoms")
  .option("--format <format>", "Output format (text|json)", "text")
  .option("--no-color", "Disable colored output")
  .option("--compiler <binary>", "Validate rules with a YARA-X binary")
  .option("--vocabulary <dir>", "Directory with vocabulary overrides")
  .action(async (target: string, options: AtomsCliOptions) => {
    try {
      const result = await runAtomsCommand(
        {
          target,
          format: parseAtomFormat(options.format),
          verbose: Boolean(options.verbose),
          color: useColor(options.color),
          compiler: options.compiler,
          vocabularyDir: options.vocabulary,
        },
        toolVersion,
      );

      if (result.output.length > 0) {
        await writeStdout(result.output + "\n");
      }
      process.exitCode = result.exitCode;
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

async function loadVersion(): Promise<string> {
  const raw = await fs.readFile(
    path.join(resolvePackageRoot(), "package.json"),
    "utf8",
  );
  const json: unknown = JSON.parse(raw);
  if (
    typeof json === "object" &&
    json !== null &&
    "version" in json &&
    typeof json.version === "string"
  ) {
    return json.version;
  }
  return "0.0.0";
}

function parseLintFormat(value: string): LintFormat {
  if (value === "text" || value === "json" || value === "sarif") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function parseAtomFormat(value: string): AtomFormat {
  if (value === "text" || value === "json") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

function useColor(requested: boolean): boolean {
  return requested && Boolean(process.stdout.isTTY);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}

await program.parseAsync(process.argv);
