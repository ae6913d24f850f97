import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export async function resolveVocabularyDirectory(): Promise<string> {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const bundledDir = path.resolve(moduleDir, "..", "..", "vocabulary");
  if (await existsDirectory(bundledDir)) {
    return bundledDir;
  }

  const cwdDir = path.resolve(process.cwd(), "vocabulary");
  if (await existsDirectory(cwdDir)) {
    return cwdDir;
  }

  throw new Error(
    "Unable to find built-in vocabulary directory. Reinstall atomlint or run it from the package root.",
  );
}

export function resolvePackageRoot(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(moduleDir, "..", "..");
}

async function existsDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
