// ─── Procedure Dispatch ────────────────────────────────────────────
// Resolves a leaf's `Type` to a module from the plugin registry,
// configures it, and wraps it in a procedure node. Resolution happens
// once, while the tree is built; the node keeps the instance.

import type { ProcedureDocument } from "@scenario-runner/schema";
import { ConfigurationError } from "../errors.js";
import type { ExecutionContext } from "../context/execution-context.js";
import type { PluginRegistry } from "../plugins/plugin-registry.js";
import { ExpressionNode } from "./expression-node.js";

/** Suffixes appended to `Type`, in lookup order: predicates first, then actions. */
export const PROCEDURE_SUFFIXES = ["Condition", "Action"] as const;

export class ProcedureDispatcher {
  constructor(private readonly registry: PluginRegistry) {}

  /** Module names a `Type` may resolve to, in lookup order. */
  candidates(typeName: string): readonly string[] {
    return PROCEDURE_SUFFIXES.map((suffix) => `${typeName}${suffix}`);
  }

  /** The first candidate the registry declares, if any. */
  resolveName(typeName: string): string | undefined {
    const declared = this.registry.declaredNames();
    return this.candidates(typeName).find((name) => declared.has(name));
  }

  /**
   * Builds a procedure node for a leaf document.
   *
   * @throws {ConfigurationError} if no module matches `Type` or the module
   *   rejects its configuration.
   */
  dispatch(document: ProcedureDocument, context: ExecutionContext): ExpressionNode {
    const name = this.resolveName(document.Type);
    if (name === undefined) {
      throw new ConfigurationError(
        `Failed to load procedure of type "${document.Type}": no module named ${this.candidates(document.Type)
          .map((candidate) => `"${candidate}"`)
          .join(" or ")}`,
        document
      );
    }

    const module = this.registry.resolve(name);
    if (!module) {
      throw new ConfigurationError(
        `Plugin registry declares "${name}" but could not create it`,
        document
      );
    }

    try {
      module.configure(document, context);
    } catch (error) {
      module.dispose?.();
      const message = error instanceof Error ? error.message : String(error);
      const issues = error instanceof ConfigurationError ? error.issues : [];
      throw new ConfigurationError(
        `Syntax error: malformed procedure "${document.Type}". ${message}`,
        document,
        issues
      );
    }

    return ExpressionNode.procedure(document, module);
  }
}
