// ─── @scenario-runner/engine ───────────────────────────────────────
// Scenario criteria evaluation and intersection signal control.
// Re-exports the expression engine, collaborators, and the evaluator.

export { ConfigurationError, EvaluationError, ScenarioStateError } from "./errors.js";
export * from "./context/index.js";
export * from "./expression/index.js";
export * from "./intersection/index.js";
export * from "./plugins/index.js";
export * from "./scenario/index.js";
