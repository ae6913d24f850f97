import { describe, expect, it } from "vitest";
import {
  concreteByteCount,
  decodeHexPattern,
  decodeTextLiteral,
} from "../../src/parser/index.js";

describe("decodeTextLiteral", () => {
  it("resolves simple and hex escapes", () => {
    const decoded = decodeTextLiteral("a\\x41\\n");
    expect(decoded.text).toBe("aA\n");
    expect(Array.from(decoded.bytes)).toEqual([0x61, 0x41, 0x0a]);
  });

  it("encodes non-ASCII characters as UTF-8", () => {
    const decoded = decodeTextLiteral("é");
    expect(decoded.text.length).toBe(1);
    expect(Array.from(decoded.bytes)).toEqual([0xc3, 0xa9]);
  });

  it("encodes characters outside the BMP as one code point", () => {
    const decoded = decodeTextLiteral("😀a");
    expect(Array.from(decoded.bytes)).toEqual([0xf0, 0x9f, 0x98, 0x80, 0x61]);
    expect(decoded.text).toBe("😀a");
  });

  it("keeps unknown escapes and a trailing backslash literally", () => {
    expect(decodeTextLiteral("a\\qb").text).toBe("a\\qb");
    expect(decodeTextLiteral("a\\qb").bytes.length).toBe(4);
    expect(Array.from(decodeTextLiteral("ab\\").bytes)).toEqual([
      0x61, 0x62, 0x5c,
    ]);
  });
});

describe("decodeHexPattern", () => {
  it("keeps a placeholder byte for each wildcard", () => {
    const pattern = decodeHexPattern("41 ?? 42 43");
    expect(Array.from(pattern.bytes)).toEqual([0x41, 0x00, 0x42, 0x43]);
    expect([...pattern.wildcardOffsets]).toEqual([1]);
    expect(concreteByteCount(pattern)).toBe(3);
  });

  it("treats nibble wildcards as wildcards and strips braces", () => {
    const pattern = decodeHexPattern("{ 4? AA }");
    expect(Array.from(pattern.bytes)).toEqual([0x00, 0xaa]);
    expect([...pattern.wildcardOffsets]).toEqual([0]);
    expect(concreteByteCount(pattern)).toBe(1);
  });

  it("skips jumps and alternation tokens", () => {
    const pattern = decodeHexPattern("4D [2-4] 5A ( 01 | 02 )");
    expect(Array.from(pattern.bytes)).toEqual([0x4d, 0x5a, 0x01, 0x02]);
  });
});
