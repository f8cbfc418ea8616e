/**
 * Conversion of zod issues into the structured form reported by loaders.
 */

import type { ZodIssue } from "zod";

/**
 * Individual validation issue.
 */
export interface ValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

export function formatZodIssues(zodIssues: ZodIssue[]): ValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Render issues one per line, prefixed by a heading.
 */
export function formatIssueList(heading: string, issues: readonly ValidationIssue[]): string {
  const lines = [heading];
  for (const issue of issues) {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    lines.push(`  - ${path}: ${issue.message}`);
  }
  return lines.join("\n");
}
