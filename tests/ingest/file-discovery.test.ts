import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverRuleFiles, isRuleFile } from "../../src/ingest/file-discovery.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "atomlint-ingest-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

describe("discoverRuleFiles", () => {
  it("collects rule files recursively in path order", async () => {
    await fs.mkdir(path.join(tempDir, "sub"));
    await fs.mkdir(path.join(tempDir, "node_modules"));
    await writeText(path.join(tempDir, "sub", "b.yara"), "rule b { condition: true }");
    await writeText(path.join(tempDir, "a.yar"), "rule a { condition: true }");
    await writeText(path.join(tempDir, "notes.txt"), "not a rule");
    await writeText(
      path.join(tempDir, "node_modules", "c.yar"),
      "rule c { condition: true }",
    );

    const files = await discoverRuleFiles(tempDir);

    expect(files.map((file) => file.relativePath)).toEqual(["a.yar", "sub/b.yara"]);
  });

  it("returns a file target whatever its extension", async () => {
    const filePath = path.join(tempDir, "single.txt");
    await writeText(filePath, "rule s { condition: true }");

    const files = await discoverRuleFiles(filePath);

    expect(files).toEqual([
      { absolutePath: filePath, relativePath: "single.txt", sizeBytes: 26 },
    ]);
  });

  it("skips files above the size limit", async () => {
    await writeText(path.join(tempDir, "small.yar"), "rule");
    await writeText(path.join(tempDir, "large.yar"), "rule large");

    const files = await discoverRuleFiles(tempDir, { maxFileSizeBytes: 5 });

    expect(files.map((file) => file.relativePath)).toEqual(["small.yar"]);
  });

  it("rejects a missing target", async () => {
    const missing = path.join(tempDir, "missing");
    await expect(discoverRuleFiles(missing)).rejects.toThrow(
      `Path does not exist: ${missing}`,
    );
  });
});

describe("isRuleFile", () => {
  it("matches rule extensions case-insensitively", () => {
    expect(isRuleFile("x.YAR")).toBe(true);
    expect(isRuleFile("x.yara")).toBe(true);
    expect(isRuleFile("x.yarc")).toBe(false);
  });
});

async function writeText(filePath: string, content: string): Promise<void> {
  await fs.writeFile(filePath, content, "utf8");
}
