import { execFile } from "node:child_process";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import type { CompileOutcome, RuleCompiler } from "./types.js";

const execFileAsync = promisify(execFile);

const COMPILE_TIMEOUT_MS = 60_000;

/**
 * Compiles rule source with the YARA-X command-line tool (`yr compile`).
 * A missing binary is thrown rather than reported as a compilation failure.
 */
export function createYrCompiler(binary = "yr"): RuleCompiler {
  return {
    async compile(source: string): Promise<CompileOutcome> {
      const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "atomlint-"));
      try {
        const rulesPath = path.join(tempDir, "rules.yar");
        const outputPath = path.join(tempDir, "rules.yarc");
        await fs.writeFile(rulesPath, source, "utf8");
        await execFileAsync(binary, ["compile", rulesPath, "-o", outputPath], {
          timeout: COMPILE_TIMEOUT_MS,
        });
        return { ok: true };
      } catch (error) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
          throw new Error(
            `Rule compiler not found: ${binary}. Install the YARA-X CLI or omit --compiler.`,
          );
        }
        return { ok: false, message: compilerMessage(error) };
      } finally {
        await fs.rm(tempDir, { recursive: true, force: true });
      }
    },
  };
}

function compilerMessage(error: unknown): string {
  if (
    error instanceof Error &&
    "stderr" in error &&
    typeof error.stderr === "string" &&
    error.stderr.trim()
  ) {
    return stripAnsi(error.stderr.trim());
  }
  return error instanceof Error ? error.message : String(error);
}

function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, "");
}
