import { createIssue } from "../../issues/issue-factory.js";
import { Severity } from "../../issues/types.js";
import type { Issue } from "../../issues/types.js";
import type { ParsedRule } from "../../parser/types.js";

const REQUIRED_FIELDS = ["description", "author", "date"] as const;
const DESCRIPTION_PREFIX = "Detects";
const DESCRIPTION_MIN_LENGTH = 60;
const DESCRIPTION_MAX_LENGTH = 400;

export function checkMetadata(rule: ParsedRule): Issue[] {
  const issues: Issue[] = [];
  const add = (severity: Severity, code: string, message: string): void => {
    issues.push(createIssue(rule.name, severity, code, message, { line: rule.line }));
  };

  for (const field of REQUIRED_FIELDS) {
    if (!rule.metadata.has(field)) {
      add(Severity.Error, "E001", `Missing required metadata field: ${field}`);
    }
  }

  const description = rule.metadata.get("description");
  if (description !== undefined) {
    if (!description.startsWith(DESCRIPTION_PREFIX)) {
      add(Severity.Warning, "W002", "Description should start with 'Detects'");
    }
    if (description.length < DESCRIPTION_MIN_LENGTH) {
      add(
        Severity.Warning,
        "W003",
        `Description too short (${description.length} chars); aim for 60-400 characters`,
      );
    }
    if (description.length > DESCRIPTION_MAX_LENGTH) {
      add(
        Severity.Info,
        "I002",
        `Description quite long (${description.length} chars); consider trimming to <400`,
      );
    }
  }

  if (!rule.metadata.has("reference")) {
    add(
      Severity.Warning,
      "W004",
      "Missing 'reference' metadata; add URL to analysis or source",
    );
  }

  return issues;
}
