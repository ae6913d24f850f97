import { maskLiterals } from "./lexer.js";
import type { RuleBody, RuleDeclaration } from "./types.js";

const DECLARATION_PATTERN =
  /\b(?:(?:private|global)\s+)*rule\s+([A-Za-z_]\w*)\s*[:{]/g;

export function extractRuleNames(source: string): string[] {
  return extractRuleDeclarations(source).map((declaration) => declaration.name);
}

export function extractRuleDeclarations(
  source: string,
  masked: string = maskLiterals(source),
): RuleDeclaration[] {
  const declarations: RuleDeclaration[] = [];
  const pattern = new RegExp(DECLARATION_PATTERN.source, "g");
  let match = pattern.exec(masked);
  while (match) {
    const name = match[1];
    if (name) {
      declarations.push({ name, index: match.index });
    }
    match = pattern.exec(masked);
  }
  return declarations;
}

export function extractRuleBody(
  source: string,
  name: string,
  masked: string = maskLiterals(source),
): RuleBody | null {
  const header = new RegExp(
    `\\brule\\s+${escapeRegex(name)}\\s*(?::[^{]*)?\\{`,
  ).exec(masked);
  if (!header) {
    return null;
  }
  return readBody(source, masked, name, header.index);
}

/**
 * Body of the declaration whose header starts at `headerIndex`. Braces are
 * counted on the masked text so quoted or regex braces are never counted.
 * An unbalanced rule runs to the end of the source.
 */
export function readBody(
  source: string,
  masked: string,
  name: string,
  headerIndex: number,
): RuleBody | null {
  const open = masked.indexOf("{", headerIndex);
  if (open < 0) {
    return null;
  }

  const start = open + 1;
  let depth = 1;
  let pos = start;
  while (pos < masked.length) {
    const char = masked[pos];
    if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        break;
      }
    }
    pos += 1;
  }

  return {
    name,
    text: source.slice(start, pos),
    offset: start,
    headerIndex,
  };
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
