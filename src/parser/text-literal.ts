import type { DecodedText } from "./types.js";

const SIMPLE_ESCAPES: Readonly<Record<string, number>> = {
  n: 0x0a,
  t: 0x09,
  r: 0x0d,
  "\\": 0x5c,
  '"': 0x22,
};

export function decodeTextLiteral(raw: string): DecodedText {
  const bytes: number[] = [];
  let text = "";
  const encoder = new TextEncoder();

  for (let i = 0; i < raw.length; i += 1) {
    const char = String.fromCodePoint(raw.codePointAt(i) ?? 0);
    if (char !== "\\" || i + 1 >= raw.length) {
      text += char;
      bytes.push(...encoder.encode(char));
      i += char.length - 1;
      continue;
    }

    const escaped = raw[i + 1] ?? "";
    const simple = SIMPLE_ESCAPES[escaped];
    if (simple !== undefined) {
      text += String.fromCharCode(simple);
      bytes.push(simple);
      i += 1;
      continue;
    }

    const hex = raw.slice(i + 2, i + 4);
    if (escaped === "x" && /^[0-9A-Fa-f]{2}$/.test(hex)) {
      const value = Number.parseInt(hex, 16);
      text += String.fromCharCode(value);
      bytes.push(value);
      i += 3;
      continue;
    }

    text += char;
    bytes.push(0x5c);
  }

  return { text, bytes: Uint8Array.from(bytes) };
}
