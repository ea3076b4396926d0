// ─── Procedure Module Contract ─────────────────────────────────────
// What a condition or action module must provide to be called from an
// expression tree. Modules are created by a plugin registry, configured
// once from their document fragment, then updated once per tick.

import type { ProcedureDocument } from "@scenario-runner/schema";
import type { ExecutionContext } from "../context/execution-context.js";

/** One leaf of the diagnostic report. */
export interface ConditionReport {
  readonly name: string;
  readonly type: string;
  readonly value: boolean;
}

export interface ProcedureModule {
  /** Short type name as written after `Type:` (e.g. "Timeout"). */
  readonly type: string;
  /** Report name; empty until configured with `Name` or renamed. */
  readonly name: string;
  /** Result of the most recent update. */
  readonly result: boolean;

  rename(name: string): string;

  /** @throws {ConfigurationError} when the fragment is invalid for this module. */
  configure(config: ProcedureDocument, context: ExecutionContext): void;

  update(context: ExecutionContext): boolean;

  property(): ConditionReport;

  /** Called when the last expression node holding the module is released. */
  dispose?(): void;
}
