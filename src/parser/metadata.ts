import { maskLiterals } from "./lexer.js";
import type { Metadata } from "./types.js";

const ENTRY_PATTERN = /(\w+)\s*=\s*"((?:[^"\\\n]|\\.)*)"/g;

/**
 * Reads `key = "value"` pairs outside comments. Numeric and boolean values
 * are not extracted. A repeated key keeps its last value.
 */
export function parseMetadata(section: string | undefined): Metadata {
  const metadata = new Map<string, string>();
  if (!section) {
    return metadata;
  }

  const masked = maskLiterals(section);
  const pattern = new RegExp(ENTRY_PATTERN.source, "g");
  let match = pattern.exec(section);
  while (match) {
    const key = match[1];
    if (key && masked[match.index] === section[match.index]) {
      metadata.set(key, match[2] ?? "");
    }
    match = pattern.exec(section);
  }
  return metadata;
}
