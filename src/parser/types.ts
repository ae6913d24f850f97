export type StringKind = "text" | "byte" | "regex";

export interface RuleDeclaration {
  readonly name: string;
  readonly index: number;
}

export interface RuleBody {
  readonly name: string;
  readonly text: string;
  readonly offset: number;
  readonly headerIndex: number;
}

export interface SectionSpan {
  readonly text: string;
  readonly offset: number;
}

export interface RuleSections {
  readonly meta?: SectionSpan;
  readonly strings?: SectionSpan;
  readonly condition?: SectionSpan;
}

export type Metadata = ReadonlyMap<string, string>;

export interface StringDefinition {
  readonly id: string;
  readonly kind: StringKind;
  readonly rawValue: string;
  readonly modifiers: readonly string[];
  readonly regexFlags: string;
  readonly offset: number;
}

export interface DecodedBytePattern {
  readonly bytes: Uint8Array;
  readonly wildcardOffsets: ReadonlySet<number>;
}

export interface DecodedText {
  readonly text: string;
  readonly bytes: Uint8Array;
}

export interface ParsedString extends StringDefinition {
  readonly line: number;
}

export interface ParsedCondition {
  readonly text: string;
  readonly line: number;
}

export interface ParsedRule {
  readonly name: string;
  readonly line: number;
  readonly metadata: Metadata;
  readonly strings: readonly ParsedString[];
  readonly condition: ParsedCondition | null;
}
