// ─── Zod Issue Formatter ───────────────────────────────────────────
// Renders Zod validation issues as one line of diagnostics.
// Uses a minimal structural type so callers can pass issues from any
// schema (scenario documents and module configuration alike).

/** Minimal shape of a Zod issue (path + message). */
export interface ZodIssueLike {
  readonly path: readonly (string | number)[];
  readonly message: string;
}

/**
 * Formats Zod issues into a single string, each rendered as `path: message`
 * and joined by "; ". Root-level issues (empty path) use `(root)`.
 *
 * @example
 * formatZodIssues([{ path: ["Condition", "Success"], message: "Required" }])
 * // => "Invalid scenario document: Condition.Success: Required"
 */
export function formatZodIssues(
  issues: readonly ZodIssueLike[],
  subject = "scenario document"
): string {
  return `Invalid ${subject}: ${describeZodIssues(issues).join("; ")}`;
}

/** Renders each issue as `path: message`, preserving order. */
export function describeZodIssues(
  issues: readonly ZodIssueLike[]
): readonly string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
