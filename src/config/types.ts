import type { AtomTables } from "../atoms/types.js";
import type { LintVocabulary } from "../lint/types.js";

export const LINT_VOCABULARY_FILE = "lint.yaml";
export const ATOM_VOCABULARY_FILE = "atoms.yaml";

export interface Vocabulary {
  readonly version: string;
  readonly lint: LintVocabulary;
  readonly atoms: AtomTables;
}

export interface LoadVocabularyOptions {
  readonly baseDir: string;
  readonly overrideDir?: string;
}
