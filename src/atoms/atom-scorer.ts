import { ATOM_LENGTH } from "./types.js";
import type { Atom, AtomScorer, AtomSelection, AtomTables } from "./types.js";

const SINGLE_VALUE_PENALTY = 80;
const TWO_VALUE_PENALTY = 40;
const NULL_BYTE_PENALTY = 15;
const BAD_PATTERN_PENALTY = 60;
const COMMON_SEQUENCE_PENALTY = 30;
const PRINTABLE_PENALTY = 10;

export function createAtomScorer(tables: AtomTables): AtomScorer {
  const scoreAtom = (atom: Uint8Array): number => {
    if (atom.length !== ATOM_LENGTH) {
      return 0;
    }

    let score = 100;

    const distinct = new Set(atom).size;
    if (distinct === 1) {
      score -= SINGLE_VALUE_PENALTY;
    } else if (distinct === 2) {
      score -= TWO_VALUE_PENALTY;
    }

    for (const byte of atom) {
      if (byte === 0x00) {
        score -= NULL_BYTE_PENALTY;
      }
    }

    if (tables.badPatterns.some((entry) => containsSequence(atom, entry.bytes))) {
      score -= BAD_PATTERN_PENALTY;
    }

    if (
      tables.commonSequences.some((entry) => containsSequence(atom, entry.bytes))
    ) {
      score -= COMMON_SEQUENCE_PENALTY;
    }

    if (atom.every((byte) => byte >= 0x20 && byte <= 0x7e)) {
      score -= PRINTABLE_PENALTY;
    }

    return Math.max(0, score);
  };

  const findBestAtom = (
    bytes: Uint8Array,
    wildcardOffsets: ReadonlySet<number> = new Set(),
  ): AtomSelection => {
    let best: Atom | null = null;
    let bestScore = 0;
    let candidates = 0;

    for (let i = 0; i + ATOM_LENGTH <= bytes.length; i += 1) {
      if (windowHasWildcard(i, wildcardOffsets)) {
        continue;
      }
      candidates += 1;

      const window = bytes.slice(i, i + ATOM_LENGTH);
      const score = scoreAtom(window);
      if (score > bestScore) {
        bestScore = score;
        best = { bytes: window, offset: i, score };
      }
    }

    return { atom: best, score: bestScore, candidates };
  };

  return { tables, scoreAtom, findBestAtom };
}

export function formatAtom(bytes: Uint8Array): string {
  return Array.from(bytes, (byte) =>
    byte.toString(16).padStart(2, "0").toUpperCase(),
  ).join("");
}

function windowHasWildcard(
  start: number,
  wildcardOffsets: ReadonlySet<number>,
): boolean {
  for (let offset = start; offset < start + ATOM_LENGTH; offset += 1) {
    if (wildcardOffsets.has(offset)) {
      return true;
    }
  }
  return false;
}

function containsSequence(haystack: Uint8Array, needle: Uint8Array): boolean {
  if (needle.length === 0 || needle.length > haystack.length) {
    return false;
  }
  for (let i = 0; i + needle.length <= haystack.length; i += 1) {
    let matched = true;
    for (let j = 0; j < needle.length; j += 1) {
      if (haystack[i + j] !== needle[j]) {
        matched = false;
        break;
      }
    }
    if (matched) {
      return true;
    }
  }
  return false;
}
