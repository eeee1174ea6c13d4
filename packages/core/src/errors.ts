import type { z } from "zod";

export class TracewireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TracewireError";
  }
}

/**
 * A carrier could not be turned into a context: a required field is missing
 * or does not parse. Lists every offending field, not just the first.
 */
export class MalformedCarrierError extends TracewireError {
  /** Carrier keys that failed, in table order. */
  readonly keys: string[];
  readonly issues: readonly z.ZodIssue[];

  constructor(issues: readonly z.ZodIssue[]) {
    super(`malformed carrier: ${issues.map(describeIssue).join("; ")}`);
    this.name   = "MalformedCarrierError";
    this.keys   = [...new Set(issues.map(issueKey))];
    this.issues = issues;
  }
}

function issueKey(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? String(issue.path[0]) : "<carrier>";
}

function describeIssue(issue: z.ZodIssue): string {
  return `${issueKey(issue)}: ${issue.message}`;
}
