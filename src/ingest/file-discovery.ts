import fs from "node:fs/promises";
import path from "node:path";
import { RULE_FILE_EXTENSIONS } from "./types.js";
import type { RuleFileDiscoveryOptions, RuleFileEntry } from "./types.js";

const DEFAULT_MAX_FILE_SIZE_BYTES = 10_000_000;
const SKIPPED_DIRECTORIES = new Set([".git", "node_modules"]);

export async function discoverRuleFiles(
  target: string,
  options: RuleFileDiscoveryOptions = {},
): Promise<RuleFileEntry[]> {
  const resolved = path.resolve(target);
  const stats = await fs.stat(resolved).catch(() => null);
  if (!stats) {
    throw new Error(`Path does not exist: ${target}`);
  }

  if (stats.isFile()) {
    return [
      {
        absolutePath: resolved,
        relativePath: path.basename(resolved),
        sizeBytes: stats.size,
      },
    ];
  }

  if (!stats.isDirectory()) {
    throw new Error(`Not a file or directory: ${target}`);
  }

  const realRoot = await fs.realpath(resolved);
  const entries: RuleFileEntry[] = [];
  await walkDirectory(realRoot, realRoot, entries, {
    maxFileSize: options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
    visitedDirs: new Set<string>(),
  });

  entries.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  return entries;
}

export function isRuleFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return RULE_FILE_EXTENSIONS.some((value) => value === ext);
}

interface WalkContext {
  readonly maxFileSize: number;
  readonly visitedDirs: Set<string>;
}

async function walkDirectory(
  rootPath: string,
  currentPath: string,
  entries: RuleFileEntry[],
  context: WalkContext,
): Promise<void> {
  const realCurrent = await fs.realpath(currentPath);
  if (context.visitedDirs.has(realCurrent)) {
    return;
  }
  context.visitedDirs.add(realCurrent);

  const dirEntries = await fs.readdir(currentPath, { withFileTypes: true });
  for (const dirent of dirEntries) {
    const absolutePath = path.join(currentPath, dirent.name);

    if (dirent.isSymbolicLink()) {
      const resolved = await safeRealpath(absolutePath);
      if (!resolved || !isWithinRoot(rootPath, resolved)) {
        continue;
      }
      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        await walkDirectory(rootPath, resolved, entries, context);
      } else if (stats.isFile() && isRuleFile(dirent.name)) {
        addEntry(rootPath, absolutePath, stats.size, entries, context);
      }
      continue;
    }

    if (dirent.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(dirent.name)) {
        await walkDirectory(rootPath, absolutePath, entries, context);
      }
      continue;
    }

    if (dirent.isFile() && isRuleFile(dirent.name)) {
      const stats = await fs.stat(absolutePath);
      addEntry(rootPath, absolutePath, stats.size, entries, context);
    }
  }
}

function addEntry(
  rootPath: string,
  absolutePath: string,
  sizeBytes: number,
  entries: RuleFileEntry[],
  context: WalkContext,
): void {
  if (sizeBytes > context.maxFileSize) {
    return;
  }
  entries.push({
    absolutePath,
    relativePath: toRelativePosix(rootPath, absolutePath),
    sizeBytes,
  });
}

function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

async function safeRealpath(targetPath: string): Promise<string | null> {
  try {
    return await fs.realpath(targetPath);
  } catch {
    return null;
  }
}
