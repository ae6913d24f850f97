import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runAtomsCommand } from "../../src/cli/atoms-command.js";
import { runLintCommand } from "../../src/cli/lint-command.js";

const RULE = [
  "rule foo {",
  "  meta:",
  '    description = "Detects a PHP webshell that evaluates base64 payloads posted by operators"',
  '    author = "tester"',
  '    date = "2024-01-01"',
  '    reference = "https://example.com/report"',
  "  strings:",
  "    $a = { 4D 5A 90 00 }",
  "  condition:",
  "    $a",
  "}",
].join("\n");

const W001_LINE =
  "  WARNING [W001] foo:1: Rule name 'foo' should follow CATEGORY_PLATFORM_FAMILY_DATE format";

let tempDir: string;
let rulePath: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "atomlint-cli-"));
  rulePath = path.join(tempDir, "sample.yar");
  await fs.writeFile(rulePath, RULE, "utf8");
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("lint command", () => {
  it("renders text output and passes on warnings", async () => {
    const result = await runLintCommand(
      { target: rulePath, format: "text" },
      "0.3.0",
    );

    expect(result.output).toBe(`${rulePath}\n${W001_LINE}`);
    expect(result.exitCode).toBe(0);
  });

  it("fails on warnings in strict mode", async () => {
    const result = await runLintCommand(
      { target: rulePath, format: "text", strict: true },
      "0.3.0",
    );
    expect(result.exitCode).toBe(1);
  });

  it("writes a JSON report to a file", async () => {
    const outPath = path.join(tempDir, "report.json");
    const result = await runLintCommand(
      { target: tempDir, format: "json", out: outPath },
      "0.3.0",
    );

    const written = await fs.readFile(outPath, "utf8");
    expect(written).toBe(result.output);
    const parsed = JSON.parse(written) as {
      tool: { version: string };
      summary: { files: number; warnings: number; errors: number };
    };
    expect(parsed.tool.version).toBe("0.3.0");
    expect(parsed.summary).toMatchObject({ files: 1, warnings: 1, errors: 0 });
  });

  it("renders SARIF", async () => {
    const result = await runLintCommand(
      { target: rulePath, format: "sarif" },
      "0.3.0",
    );
    const parsed = JSON.parse(result.output) as {
      runs: Array<{ results: Array<{ ruleId: string }> }>;
    };
    expect(parsed.runs[0]?.results.map((entry) => entry.ruleId)).toEqual(["W001"]);
  });

  it("rejects a missing target", async () => {
    const missing = path.join(tempDir, "missing.yar");
    await expect(
      runLintCommand({ target: missing, format: "text" }, "0.3.0"),
    ).rejects.toThrow(`Path does not exist: ${missing}`);
  });
});

describe("atoms command", () => {
  it("reports weak atoms from the built-in tables", async () => {
    const result = await runAtomsCommand(
      { target: rulePath, format: "text" },
      "0.3.0",
    );

    expect(result.output).toBe(
      "\nfoo\n    WARNING: String $a best atom score is 55/100; may cause performance issues",
    );
    expect(result.exitCode).toBe(1);
  });

  it("renders atom details as JSON", async () => {
    const result = await runAtomsCommand(
      { target: rulePath, format: "json" },
      "0.3.0",
    );
    const parsed = JSON.parse(result.output) as {
      results: Array<{
        rules: Array<{
          strings: Array<{ best_atom: string | null; score: number }>;
        }>;
      }>;
    };
    expect(parsed.results[0]?.rules[0]?.strings[0]).toMatchObject({
      best_atom: "4D5A9000",
      score: 55,
    });
  });
});
