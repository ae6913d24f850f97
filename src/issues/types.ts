export const enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
}

export const COMPILATION_SCOPE = "(compilation)";

export interface Issue {
  /** Rule name, or `(compilation)` for compiler failures. */
  readonly scope: string;
  readonly severity: Severity;
  readonly code: string;
  readonly message: string;
  readonly suggestion?: string;
  readonly line?: number;
}

export interface AnalysisResult {
  readonly filePath: string;
  readonly parseError?: string;
  readonly issues: readonly Issue[];
}
