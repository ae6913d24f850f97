import { maskLiterals, scanDelimited } from "./lexer.js";
import type { StringDefinition, StringKind } from "./types.js";

const ASSIGNMENT_PATTERN = /\$(\w*)\s*=\s*/y;
const REGEX_FLAGS_PATTERN = /[is]*/y;

interface Literal {
  readonly kind: StringKind;
  readonly value: string;
  readonly end: number;
}

/**
 * Tokenizes a strings section left to right. Each definition is classified
 * once, by the delimiter that opens its value.
 */
export function parseStringDefinitions(
  section: string | undefined,
  baseOffset = 0,
): StringDefinition[] {
  if (!section) {
    return [];
  }

  const masked = maskLiterals(section);
  const definitions: StringDefinition[] = [];
  let cursor = masked.indexOf("$");

  while (cursor >= 0) {
    const assignment = new RegExp(ASSIGNMENT_PATTERN.source, "y");
    assignment.lastIndex = cursor;
    const match = assignment.exec(section);
    if (!match) {
      cursor = masked.indexOf("$", cursor + 1);
      continue;
    }

    const literal = readLiteral(section, cursor + match[0].length);
    if (!literal) {
      cursor = masked.indexOf("$", cursor + match[0].length);
      continue;
    }

    let tailStart = literal.end;
    let regexFlags = "";
    if (literal.kind === "regex") {
      const flags = new RegExp(REGEX_FLAGS_PATTERN.source, "y");
      flags.lastIndex = tailStart;
      regexFlags = flags.exec(section)?.[0] ?? "";
      tailStart += regexFlags.length;
    }

    const tailEnd = findTailEnd(section, tailStart);
    definitions.push({
      id: `$${match[1] ?? ""}`,
      kind: literal.kind,
      rawValue: literal.value,
      modifiers: splitModifiers(section.slice(tailStart, tailEnd)),
      regexFlags,
      offset: baseOffset + cursor,
    });
    cursor = masked.indexOf("$", tailEnd);
  }

  return definitions;
}

export function hasModifier(
  definition: Pick<StringDefinition, "modifiers">,
  name: string,
): boolean {
  return definition.modifiers.some(
    (modifier) => modifier === name || modifier.startsWith(`${name}(`),
  );
}

function readLiteral(section: string, start: number): Literal | null {
  const opener = section[start];
  if (opener === '"') {
    const close = scanDelimited(section, start + 1, '"');
    if (section[close] !== '"') {
      return null;
    }
    return { kind: "text", value: section.slice(start + 1, close), end: close + 1 };
  }

  if (opener === "{") {
    const close = section.indexOf("}", start + 1);
    if (close < 0) {
      return null;
    }
    return {
      kind: "byte",
      value: section.slice(start + 1, close).trim(),
      end: close + 1,
    };
  }

  if (opener === "/") {
    const close = scanDelimited(section, start + 1, "/");
    if (section[close] !== "/") {
      return null;
    }
    return { kind: "regex", value: section.slice(start + 1, close), end: close + 1 };
  }

  return null;
}

function findTailEnd(section: string, start: number): number {
  let depth = 0;
  let inQuote = false;
  for (let i = start; i < section.length; i += 1) {
    const char = section[i];
    if (inQuote) {
      if (char === "\\") {
        i += 1;
      } else if (char === '"') {
        inQuote = false;
      }
      continue;
    }
    if (char === "\n") {
      return i;
    }
    if (char === '"') {
      inQuote = true;
    } else if (char === "(") {
      depth += 1;
    } else if (char === ")") {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0 && (char === "$" || isCommentStart(section, i))) {
      return i;
    }
  }
  return section.length;
}

function isCommentStart(section: string, index: number): boolean {
  const pair = section.slice(index, index + 2);
  return pair === "//" || pair === "/*";
}

function splitModifiers(tail: string): string[] {
  const modifiers: string[] = [];
  let current = "";
  let depth = 0;
  let inQuote = false;

  const flush = (): void => {
    if (current && !modifiers.includes(current)) {
      modifiers.push(current);
    }
    current = "";
  };

  for (let i = 0; i < tail.length; i += 1) {
    const char = tail[i] ?? "";
    if (inQuote) {
      current += char;
      if (char === "\\") {
        current += tail[i + 1] ?? "";
        i += 1;
      } else if (char === '"') {
        inQuote = false;
      }
      continue;
    }
    if (/\s/.test(char) && depth === 0) {
      flush();
      continue;
    }
    if (char === '"') {
      inQuote = true;
    } else if (char === "(") {
      depth += 1;
    } else if (char === ")") {
      depth = Math.max(0, depth - 1);
    }
    current += char;
  }
  flush();
  return modifiers;
}
