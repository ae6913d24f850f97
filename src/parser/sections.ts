import { maskLiterals } from "./lexer.js";
import type { RuleSections, SectionSpan } from "./types.js";

type SectionName = keyof RuleSections;

const SECTION_PATTERN = /\b(meta|strings|condition)\s*:/g;

export function splitSections(
  body: string,
  baseOffset = 0,
  masked: string = maskLiterals(body),
): RuleSections {
  const markers: Array<{ name: SectionName; start: number; contentStart: number }> =
    [];
  const pattern = new RegExp(SECTION_PATTERN.source, "g");
  let match = pattern.exec(masked);
  while (match) {
    const name = match[1];
    if (name === "meta" || name === "strings" || name === "condition") {
      markers.push({
        name,
        start: match.index,
        contentStart: match.index + match[0].length,
      });
    }
    match = pattern.exec(masked);
  }

  const sections: { -readonly [K in SectionName]?: SectionSpan } = {};
  markers.forEach((marker, index) => {
    if (sections[marker.name]) {
      return;
    }
    const end = markers[index + 1]?.start ?? body.length;
    sections[marker.name] = {
      text: body.slice(marker.contentStart, end),
      offset: baseOffset + marker.contentStart,
    };
  });
  return sections;
}
