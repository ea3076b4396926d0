// ─── @scenario-runner/schema ───────────────────────────────────────
// Canonical type definitions and Zod validation for .scenario.yaml files.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index.js";
export * from "./schema/index.js";
