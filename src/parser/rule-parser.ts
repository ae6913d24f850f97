import { maskLiterals, stripComments } from "./lexer.js";
import { parseMetadata } from "./metadata.js";
import { extractRuleDeclarations, readBody } from "./rule-extractor.js";
import { splitSections } from "./sections.js";
import { createLineIndex } from "./source-location.js";
import { parseStringDefinitions } from "./string-definitions.js";
import type { ParsedCondition, ParsedRule } from "./types.js";

export function parseRuleSource(source: string): ParsedRule[] {
  const masked = maskLiterals(source);
  const lines = createLineIndex(source);

  return extractRuleDeclarations(source, masked).map((declaration) => {
    const line = lines.lineAt(declaration.index);
    const body = readBody(source, masked, declaration.name, declaration.index);
    if (!body) {
      return {
        name: declaration.name,
        line,
        metadata: new Map<string, string>(),
        strings: [],
        condition: null,
      };
    }

    const bodyMask = masked.slice(body.offset, body.offset + body.text.length);
    const sections = splitSections(body.text, body.offset, bodyMask);
    const strings = parseStringDefinitions(
      sections.strings?.text,
      sections.strings?.offset ?? 0,
    ).map((definition) => ({
      ...definition,
      line: lines.lineAt(definition.offset),
    }));

    let condition: ParsedCondition | null = null;
    if (sections.condition) {
      condition = {
        text: stripComments(sections.condition.text).trim(),
        line: lines.lineAt(sections.condition.offset),
      };
    }

    return {
      name: declaration.name,
      line,
      metadata: parseMetadata(sections.meta?.text),
      strings,
      condition,
    };
  });
}
