export { createAtomScorer, formatAtom } from "./atom-scorer.js";
export { atomIssues, createAtomQualityEngine } from "./quality-engine.js";
export type { AtomQualityEngine } from "./quality-engine.js";
export { ATOM_LENGTH } from "./types.js";
export type {
  Atom,
  AtomScorer,
  AtomSelection,
  AtomTables,
  BytePatternEntry,
  RuleAtomReport,
  StringAtomReport,
} from "./types.js";
