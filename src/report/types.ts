export interface ToolInfo {
  readonly name: "atomlint";
  readonly version: string;
}

export interface ResultSummary {
  files: number;
  parse_errors: number;
  errors: number;
  warnings: number;
  info: number;
}

export interface JsonIssue {
  readonly rule: string;
  readonly severity: string;
  readonly code: string;
  readonly message: string;
  readonly suggestion: string | null;
  readonly line: number | null;
}

export interface JsonFileResult {
  readonly file: string;
  readonly parse_error: string | null;
  readonly issues: readonly JsonIssue[];
}

export interface JsonStringReport {
  readonly string_id: string;
  readonly kind: string;
  readonly line: number;
  readonly byte_count: number;
  readonly best_atom: string | null;
  readonly score: number;
}

export interface JsonAtomFileResult extends JsonFileResult {
  readonly rules: readonly {
    readonly rule: string;
    readonly strings: readonly JsonStringReport[];
  }[];
}

export interface LintReport {
  readonly tool: ToolInfo;
  readonly summary: ResultSummary;
  readonly results: readonly JsonFileResult[];
}

export interface AtomReport {
  readonly tool: ToolInfo;
  readonly summary: ResultSummary;
  readonly results: readonly JsonAtomFileResult[];
}

export interface TextRenderOptions {
  readonly color?: boolean;
}

export interface AtomTextRenderOptions extends TextRenderOptions {
  readonly verbose?: boolean;
}
