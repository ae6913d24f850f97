export { discoverRuleFiles, isRuleFile } from "./file-discovery.js";
export { RULE_FILE_EXTENSIONS } from "./types.js";
export type { RuleFileDiscoveryOptions, RuleFileEntry } from "./types.js";
