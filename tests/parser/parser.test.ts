import { describe, expect, it } from "vitest";
import {
  createLineIndex,
  extractRuleBody,
  extractRuleNames,
  hasModifier,
  maskLiterals,
  parseMetadata,
  parseRuleSource,
  parseStringDefinitions,
  splitSections,
} from "../../src/parser/index.js";
import { stripComments } from "../../src/parser/lexer.js";

const SOURCE = [
  "rule MAL_Win_Foo_2024 : tag1 {",
  "  meta:",
  '    description = "Detects { braces } in text"',
  '    author = "tester"',
  "  strings:",
  '    $a = "hello {" ascii wide',
  "    $b = { 4D 5A ?? 00 }",
  "    $c = /ab{2}c/i nocase",
  "  condition:",
  "    any of them",
  "}",
  "",
  "private rule Second {",
  "  condition:",
  "    true",
  "}",
].join("\n");

describe("maskLiterals", () => {
  it("blanks strings and comments but keeps offsets", () => {
    const source = 'x = "a}b" // }\ny';
    const masked = maskLiterals(source);
    expect(masked).toBe('x = "   "     \ny');
    expect(masked.length).toBe(source.length);
  });

  it("blanks regex literals after an assignment", () => {
    expect(maskLiterals("$r = /a{b/ wide")).toBe("$r = /   / wide");
  });
});

describe("stripComments", () => {
  it("blanks comments but keeps quoted text", () => {
    const stripped = stripComments('"http://x" // c');
    expect(stripped).toBe('"http://x"     ');
  });
});

describe("rule extraction", () => {
  it("finds every rule name in declaration order", () => {
    expect(extractRuleNames(SOURCE)).toEqual(["MAL_Win_Foo_2024", "Second"]);
  });

  it("ignores rule keywords inside strings and comments", () => {
    const source = [
      "// rule Commented { condition: true }",
      'rule Real { meta: note = "rule Quoted {" condition: true }',
    ].join("\n");
    expect(extractRuleNames(source)).toEqual(["Real"]);
  });

  it("extracts the body of a tagged rule", () => {
    const body = extractRuleBody("rule X : t1 t2 { condition: true }", "X");
    expect(body?.text).toBe(" condition: true ");
    expect(body?.headerIndex).toBe(0);
  });

  it("returns null for an undeclared rule", () => {
    expect(extractRuleBody(SOURCE, "Missing")).toBeNull();
  });
});

describe("splitSections", () => {
  it("splits on section keywords outside literals", () => {
    const body = '\n meta:\n  a = "condition: x"\n condition:\n  true\n';
    const sections = splitSections(body, 100);
    expect(sections.meta?.text).toBe('\n  a = "condition: x"\n ');
    expect(sections.meta?.offset).toBe(107);
    expect(sections.condition?.text).toBe("\n  true\n");
    expect(sections.strings).toBeUndefined();
  });
});

describe("parseMetadata", () => {
  it("keeps the last value of a repeated key and skips non-strings", () => {
    const metadata = parseMetadata(
      [
        'author = "a"',
        'author = "b"',
        "score = 75",
        "flag = true",
        'desc = "say \\"hi\\""',
      ].join("\n"),
    );
    expect(metadata.get("author")).toBe("b");
    expect(metadata.get("desc")).toBe('say \\"hi\\"');
    expect(metadata.has("score")).toBe(false);
    expect(metadata.size).toBe(2);
  });

  it("ignores entries inside comments", () => {
    const metadata = parseMetadata(
      [
        '// author = "old"',
        '/* date = "2020-01-01" */',
        'description = "kept"',
      ].join("\n"),
    );
    expect([...metadata.keys()]).toEqual(["description"]);
  });

  it("returns an empty map for a missing section", () => {
    expect(parseMetadata(undefined).size).toBe(0);
  });
});

describe("parseStringDefinitions", () => {
  it("classifies each definition once by its delimiter", () => {
    const definitions = parseStringDefinitions(
      ['$a = "abcd"', "$b = { 4D 5A }", "$c = /a.b/s"].join("\n"),
    );
    expect(definitions.map((definition) => definition.kind)).toEqual([
      "text",
      "byte",
      "regex",
    ]);
    expect(definitions[2]?.regexFlags).toBe("s");
  });

  it("keeps parenthesized modifier arguments together", () => {
    const [definition] = parseStringDefinitions(
      '$x = "abcd" xor(0x01-0xff) base64("ABC DEF") wide wide',
    );
    expect(definition?.modifiers).toEqual([
      "xor(0x01-0xff)",
      'base64("ABC DEF")',
      "wide",
    ]);
    expect(definition && hasModifier(definition, "xor")).toBe(true);
    expect(definition && hasModifier(definition, "base64wide")).toBe(false);
  });

  it("separates definitions on one line and stops at comments", () => {
    const definitions = parseStringDefinitions(
      '$a = "aaaa" $b = "bbbb" // nocase',
    );
    expect(definitions.map((definition) => definition.id)).toEqual(["$a", "$b"]);
    expect(definitions[0]?.modifiers).toEqual([]);
    expect(definitions[1]?.modifiers).toEqual([]);
  });

  it("does not read a dollar sign inside a value as a definition", () => {
    const definitions = parseStringDefinitions('$a = "$b = x"\n$ = "anon"');
    expect(definitions.map((definition) => definition.id)).toEqual(["$a", "$"]);
    expect(definitions[0]?.rawValue).toBe("$b = x");
  });
});

describe("createLineIndex", () => {
  it("maps offsets to 1-based lines", () => {
    const lines = createLineIndex("a\nb\nc");
    expect(lines.lineAt(0)).toBe(1);
    expect(lines.lineAt(2)).toBe(2);
    expect(lines.lineAt(4)).toBe(3);
    expect(lines.lineAt(100)).toBe(3);
  });
});

describe("parseRuleSource", () => {
  it("parses metadata, strings and condition with line numbers", () => {
    const [first, second] = parseRuleSource(SOURCE);

    expect(first?.name).toBe("MAL_Win_Foo_2024");
    expect(first?.line).toBe(1);
    expect(first?.metadata.get("description")).toBe(
      "Detects { braces } in text",
    );
    expect(
      first?.strings.map((entry) => [entry.id, entry.kind, entry.rawValue, entry.line]),
    ).toEqual([
      ["$a", "text", "hello {", 6],
      ["$b", "byte", "4D 5A ?? 00", 7],
      ["$c", "regex", "ab{2}c", 8],
    ]);
    expect(first?.strings[0]?.modifiers).toEqual(["ascii", "wide"]);
    expect(first?.strings[2]?.regexFlags).toBe("i");
    expect(first?.strings[2]?.modifiers).toEqual(["nocase"]);
    expect(first?.condition).toEqual({ text: "any of them", line: 9 });

    expect(second?.name).toBe("Second");
    expect(second?.line).toBe(13);
    expect(second?.condition?.text).toBe("true");
  });

  it("keeps rules that share a name apart", () => {
    const rules = parseRuleSource(
      "rule Dup { condition: true }\nrule Dup { condition: false }",
    );
    expect(rules.map((rule) => [rule.line, rule.condition?.text])).toEqual([
      [1, "true"],
      [2, "false"],
    ]);
  });

  it("drops comments from the condition text", () => {
    const [rule] = parseRuleSource(
      'rule C {\n  condition:\n    // was @a[-1] == 0\n    $a and "x//y" == "z"\n}',
    );
    expect(rule?.condition).toEqual({
      text: '$a and "x//y" == "z"',
      line: 2,
    });
  });

  it("runs an unbalanced rule to the end of the source", () => {
    const [rule] = parseRuleSource("rule Open {\n  condition: true");
    expect(rule?.condition?.text).toBe("true");
  });

  it("returns nothing for a file without rules", () => {
    expect(parseRuleSource("import \"pe\"\n")).toEqual([]);
  });
});
