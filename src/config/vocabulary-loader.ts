import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import type { AtomTables, BytePatternEntry } from "../atoms/types.js";
import { decodeHexPattern, hexTokens } from "../parser/hex-pattern.js";
import type { DeprecatedFeature, LintVocabulary } from "../lint/types.js";
import { ATOM_VOCABULARY_FILE, LINT_VOCABULARY_FILE } from "./types.js";
import type { LoadVocabularyOptions, Vocabulary } from "./types.js";

type YamlDocument = Record<string, unknown>;

export async function loadVocabulary(dir: string): Promise<Vocabulary> {
  return await loadVocabularyWithOverrides({ baseDir: dir });
}

/**
 * Loads the built-in vocabulary and lets files in `overrideDir` replace any
 * of its top-level keys. Override files are optional.
 */
export async function loadVocabularyWithOverrides(
  options: LoadVocabularyOptions,
): Promise<Vocabulary> {
  const lintPath = path.join(options.baseDir, LINT_VOCABULARY_FILE);
  const atomsPath = path.join(options.baseDir, ATOM_VOCABULARY_FILE);
  let lintDoc = await readDocument(lintPath);
  let atomsDoc = await readDocument(atomsPath);

  if (options.overrideDir) {
    const lintOverride = await readOptionalDocument(
      path.join(options.overrideDir, LINT_VOCABULARY_FILE),
    );
    const atomsOverride = await readOptionalDocument(
      path.join(options.overrideDir, ATOM_VOCABULARY_FILE),
    );
    lintDoc = { ...lintDoc, ...lintOverride };
    atomsDoc = { ...atomsDoc, ...atomsOverride };
  }

  const errors: string[] = [];
  const version = lintDoc.vocabulary_version;
  if (typeof version !== "string" || version.length === 0) {
    errors.push(`${LINT_VOCABULARY_FILE}: vocabulary_version must be a string`);
  }
  const lint = parseLintVocabulary(lintDoc, errors);
  const atoms = parseAtomTables(atomsDoc, errors);
  if (errors.length > 0) {
    throw new Error(`Invalid vocabulary: ${errors.join("; ")}`);
  }

  return { version: typeof version === "string" ? version : "", lint, atoms };
}

export function parseLintVocabulary(
  doc: YamlDocument,
  errors: string[],
): LintVocabulary {
  return {
    categoryPrefixes: stringList(doc, "category_prefixes", errors),
    fpProneStrings: stringList(doc, "fp_prone_strings", errors),
    deprecatedFeatures: deprecatedFeatures(doc, errors),
  };
}

export function parseAtomTables(doc: YamlDocument, errors: string[]): AtomTables {
  return {
    badPatterns: bytePatternList(doc, "bad_patterns", errors),
    commonSequences: bytePatternList(doc, "common_sequences", errors),
  };
}

async function readDocument(filePath: string): Promise<YamlDocument> {
  const raw = await fs.readFile(filePath, "utf8");
  const doc = yaml.load(raw);
  if (!isRecord(doc)) {
    throw new Error(`Invalid vocabulary file format: ${filePath}`);
  }
  return doc;
}

async function readOptionalDocument(filePath: string): Promise<YamlDocument> {
  try {
    return await readDocument(filePath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
}

function stringList(doc: YamlDocument, key: string, errors: string[]): string[] {
  const value = doc[key];
  if (!Array.isArray(value)) {
    errors.push(`${key} must be a list`);
    return [];
  }
  const items: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === "string" && item.length > 0) {
      items.push(item);
    } else {
      errors.push(`${key}[${index}] must be a non-empty string`);
    }
  });
  return items;
}

function deprecatedFeatures(
  doc: YamlDocument,
  errors: string[],
): DeprecatedFeature[] {
  const value = doc.deprecated_features;
  if (!Array.isArray(value)) {
    errors.push("deprecated_features must be a list");
    return [];
  }
  const features: DeprecatedFeature[] = [];
  value.forEach((item, index) => {
    if (
      isRecord(item) &&
      typeof item.name === "string" &&
      typeof item.message === "string"
    ) {
      features.push({ name: item.name, message: item.message });
    } else {
      errors.push(`deprecated_features[${index}] needs name and message`);
    }
  });
  return features;
}

function bytePatternList(
  doc: YamlDocument,
  key: string,
  errors: string[],
): BytePatternEntry[] {
  const value = doc[key];
  if (!Array.isArray(value)) {
    errors.push(`${key} must be a list`);
    return [];
  }
  const entries: BytePatternEntry[] = [];
  value.forEach((item, index) => {
    if (!isRecord(item) || typeof item.bytes !== "string") {
      errors.push(`${key}[${index}] needs a bytes string`);
      return;
    }
    const pattern = decodeHexPattern(item.bytes);
    const tokenCount = hexTokens(item.bytes).length;
    if (
      pattern.bytes.length === 0 ||
      pattern.wildcardOffsets.size > 0 ||
      pattern.bytes.length !== tokenCount
    ) {
      errors.push(`${key}[${index}] bytes must be space-separated hex pairs`);
      return;
    }
    entries.push({
      bytes: pattern.bytes,
      label: typeof item.label === "string" ? item.label : item.bytes,
    });
  });
  return entries;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
