export const RULE_FILE_EXTENSIONS = [".yar", ".yara"] as const;

export interface RuleFileEntry {
  readonly absolutePath: string;
  readonly relativePath: string;
  readonly sizeBytes: number;
}

export interface RuleFileDiscoveryOptions {
  readonly maxFileSizeBytes?: number;
}
