import { describe, expect, it } from "vitest";
import { createAtomScorer, formatAtom } from "../../src/atoms/atom-scorer.js";
import type { AtomTables } from "../../src/atoms/types.js";
import { decodeHexPattern } from "../../src/parser/hex-pattern.js";

const tables: AtomTables = {
  badPatterns: [{ bytes: Uint8Array.of(0x00, 0x00, 0x00, 0x00), label: "nulls" }],
  commonSequences: [
    { bytes: Uint8Array.of(0x54, 0x68, 0x69, 0x73), label: "This" },
  ],
};

const ascii = (value: string): Uint8Array =>
  Uint8Array.from(value, (char) => char.charCodeAt(0));

describe("scoreAtom", () => {
  const scorer = createAtomScorer(tables);

  it("gives distinct non-printable bytes the full score", () => {
    expect(scorer.scoreAtom(Uint8Array.of(0x01, 0xe2, 0x33, 0x9a))).toBe(100);
  });

  it("penalizes repeated printable bytes", () => {
    expect(scorer.scoreAtom(ascii("AAAA"))).toBe(10);
    expect(scorer.scoreAtom(ascii("ABAB"))).toBe(50);
  });

  it("clamps an all-null atom at zero", () => {
    expect(scorer.scoreAtom(new Uint8Array(4))).toBe(0);
  });

  it("applies null byte and common sequence penalties", () => {
    expect(scorer.scoreAtom(Uint8Array.of(0x00, 0x01, 0x02, 0x03))).toBe(85);
    expect(scorer.scoreAtom(ascii("This"))).toBe(60);
  });

  it("scores anything but four bytes as zero", () => {
    expect(scorer.scoreAtom(Uint8Array.of(0x01, 0x02, 0x03))).toBe(0);
  });
});

describe("findBestAtom", () => {
  const scorer = createAtomScorer(tables);

  it("has no candidates below four bytes", () => {
    expect(scorer.findBestAtom(Uint8Array.of(1, 2, 3))).toEqual({
      atom: null,
      score: 0,
      candidates: 0,
    });
  });

  it("skips windows that cover a wildcard", () => {
    const pattern = decodeHexPattern("41 ?? 42 43 44 45");
    const selection = scorer.findBestAtom(pattern.bytes, pattern.wildcardOffsets);
    expect(selection.candidates).toBe(1);
    expect(selection.score).toBe(90);
    expect(selection.atom?.offset).toBe(2);
    expect(selection.atom && formatAtom(selection.atom.bytes)).toBe("42434445");
  });

  it("keeps the earliest window on a tie", () => {
    const selection = scorer.findBestAtom(Uint8Array.of(1, 2, 3, 4, 5));
    expect(selection.atom?.offset).toBe(0);
    expect(selection.score).toBe(100);
  });

  it("selects no atom when every window scores zero", () => {
    const selection = scorer.findBestAtom(new Uint8Array(8));
    expect(selection.atom).toBeNull();
    expect(selection.score).toBe(0);
    expect(selection.candidates).toBe(5);
  });
});

describe("formatAtom", () => {
  it("renders uppercase hex without separators", () => {
    expect(formatAtom(Uint8Array.of(0x4d, 0x5a, 0x0a, 0xff))).toBe("4D5A0AFF");
  });
});
