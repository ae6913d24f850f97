export {
  loadVocabulary,
  loadVocabularyWithOverrides,
  parseAtomTables,
  parseLintVocabulary,
} from "./vocabulary-loader.js";
export { ATOM_VOCABULARY_FILE, LINT_VOCABULARY_FILE } from "./types.js";
export type { LoadVocabularyOptions, Vocabulary } from "./types.js";
