// ─── Error Types ───────────────────────────────────────────────────
// Three failure classes surface to callers: configuration errors at
// construction, evaluation errors at tick time, and evaluator misuse.
// Actuator failures are not errors here; see TransitionResult.

import YAML from "yaml";

/**
 * A scenario document or module configuration that cannot be built.
 * Carries the offending fragment so the message points at the source.
 */
export class ConfigurationError extends Error {
  readonly fragment: unknown;
  readonly issues: readonly string[];

  constructor(message: string, fragment?: unknown, issues: readonly string[] = []) {
    super(fragment === undefined ? message : `${message}\n\n${renderFragment(fragment)}`);
    this.name = "ConfigurationError";
    this.fragment = fragment;
    this.issues = issues;
  }
}

/** A tick that cannot complete, e.g. a required collaborator is missing. */
export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EvaluationError";
  }
}

/** The evaluator was driven after it stopped accepting ticks. */
export class ScenarioStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScenarioStateError";
  }
}

function renderFragment(fragment: unknown): string {
  return YAML.stringify(fragment).trimEnd();
}
