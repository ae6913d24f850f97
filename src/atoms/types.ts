import type { Issue } from "../issues/types.js";
import type { StringKind } from "../parser/types.js";

export const ATOM_LENGTH = 4;

export interface BytePatternEntry {
  readonly bytes: Uint8Array;
  readonly label: string;
}

export interface AtomTables {
  readonly badPatterns: readonly BytePatternEntry[];
  readonly commonSequences: readonly BytePatternEntry[];
}

export interface Atom {
  readonly bytes: Uint8Array;
  readonly offset: number;
  readonly score: number;
}

export interface AtomSelection {
  readonly atom: Atom | null;
  readonly score: number;
  readonly candidates: number;
}

export interface AtomScorer {
  readonly tables: AtomTables;
  scoreAtom(atom: Uint8Array): number;
  findBestAtom(
    bytes: Uint8Array,
    wildcardOffsets?: ReadonlySet<number>,
  ): AtomSelection;
}

export interface StringAtomReport {
  readonly stringId: string;
  readonly kind: StringKind;
  readonly line: number;
  readonly byteCount: number;
  readonly bestAtom: string | null;
  readonly score: number;
  readonly issues: readonly Issue[];
}

export interface RuleAtomReport {
  readonly rule: string;
  readonly line: number;
  readonly strings: readonly StringAtomReport[];
}
