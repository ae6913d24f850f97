/**
 * Blanks out everything a structural search must not look into: the inside
 * of quoted strings, regex literals and comments. Every replaced character
 * becomes a space except newlines, so offsets and line numbers in the masked
 * text match the original one-to-one. Delimiters are kept.
 */
export function maskLiterals(text: string): string {
  return maskText(text, true);
}

/** Blanks comments only; quoted strings and regex literals are kept. */
export function stripComments(text: string): string {
  return maskText(text, false);
}

function maskText(text: string, blankLiterals: boolean): string {
  const chars = text.split("");
  let i = 0;

  while (i < text.length) {
    const char = text[i];
    const next = text[i + 1];

    if (char === '"') {
      const end = scanDelimited(text, i + 1, '"');
      if (blankLiterals) {
        blank(chars, i + 1, end);
      }
      i = end + 1;
      continue;
    }

    if (char === "/" && next === "/") {
      const end = lineEnd(text, i);
      blank(chars, i, end);
      i = end;
      continue;
    }

    if (char === "/" && next === "*") {
      const close = text.indexOf("*/", i + 2);
      const end = close < 0 ? text.length : close + 2;
      blank(chars, i, end);
      i = end;
      continue;
    }

    if (char === "/" && startsRegexLiteral(text, i)) {
      const end = scanDelimited(text, i + 1, "/");
      if (blankLiterals) {
        blank(chars, i + 1, end);
      }
      i = end + 1;
      continue;
    }

    i += 1;
  }

  return chars.join("");
}

export function scanDelimited(
  text: string,
  start: number,
  delimiter: string,
): number {
  let j = start;
  while (j < text.length) {
    const char = text[j];
    if (char === delimiter || char === "\n") {
      return j;
    }
    j += char === "\\" ? 2 : 1;
  }
  return text.length;
}

function startsRegexLiteral(text: string, slashIndex: number): boolean {
  let j = slashIndex - 1;
  while (j >= 0 && isBlank(text[j])) {
    j -= 1;
  }
  if (j < 0) {
    return false;
  }
  if (text[j] === "=") {
    return true;
  }
  const keywordStart = j - "matches".length + 1;
  return (
    keywordStart >= 0 &&
    text.slice(keywordStart, j + 1) === "matches" &&
    !isWordChar(text[keywordStart - 1])
  );
}

function lineEnd(text: string, from: number): number {
  const newline = text.indexOf("\n", from);
  return newline < 0 ? text.length : newline;
}

function blank(chars: string[], start: number, end: number): void {
  for (let k = start; k < end && k < chars.length; k += 1) {
    if (chars[k] !== "\n") {
      chars[k] = " ";
    }
  }
}

function isBlank(char: string | undefined): boolean {
  return char === " " || char === "\t" || char === "\r" || char === "\n";
}

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /\w/.test(char);
}
