// ─── Expression Node ───────────────────────────────────────────────
// The tree a scenario's criteria are built into. A node is a handle onto
// shared backing data: copying a handle shares the data (and any module
// state it carries), releasing the last handle disposes it.
//
//   <Expression> = <Literal> | <All> [ <Expression>* ] | <Any> [ <Expression>* ]
//                | <Not> { <Expression> } | <Procedure>
//
// Combinators never short-circuit: every child is evaluated once per
// tick, left to right, because procedure children may be actions whose
// side effects must run.

import type { ProcedureDocument } from "@scenario-runner/schema";
import { EvaluationError } from "../errors.js";
import type { ExecutionContext } from "../context/execution-context.js";
import type { ConditionReport, ProcedureModule } from "../plugins/procedure-module.js";

export type ExpressionKind = "Empty" | "Literal" | "All" | "Any" | "Not" | "Procedure";

export type LiteralValue = boolean | number;

// ─── Backing Data ──────────────────────────────────────────────────

/**
 * Shared state behind one or more ExpressionNode handles.
 * `references` counts the live handles.
 */
abstract class ExpressionData {
  references = 0;

  abstract readonly kind: Exclude<ExpressionKind, "Empty">;

  /** Type name used to number siblings in diagnostic reports. */
  abstract get type(): string;

  abstract evaluate(context: ExecutionContext, self: ExpressionNode): ExpressionNode;

  /** Unevaluated combinators and procedures carry no value and convert to false. */
  toBool(): boolean {
    return false;
  }

  property(_prefix: string, _occurrence: number): readonly ConditionReport[] {
    return [];
  }

  dispose(): void {}
}

class LiteralData extends ExpressionData {
  readonly kind = "Literal";

  constructor(readonly value: LiteralValue) {
    super();
  }

  get type(): string {
    return "Literal";
  }

  evaluate(_context: ExecutionContext, self: ExpressionNode): ExpressionNode {
    return self.copy();
  }

  toBool(): boolean {
    if (typeof this.value === "boolean") {
      return this.value;
    }
    return this.value !== 0 && !Number.isNaN(this.value);
  }
}

/** All and Any: a left fold over every operand, seeded with the identity. */
class LogicalData extends ExpressionData {
  private readonly operands: readonly ExpressionNode[];

  constructor(
    readonly kind: "All" | "Any",
    operands: readonly ExpressionNode[]
  ) {
    super();
    this.operands = operands.map((operand) => operand.copy());
  }

  get type(): string {
    return this.kind;
  }

  get children(): readonly ExpressionNode[] {
    return this.operands;
  }

  evaluate(context: ExecutionContext): ExpressionNode {
    let result = this.kind === "All";
    for (const operand of this.operands) {
      const value = truthOf(operand, context);
      result = this.kind === "All" ? result && value : result || value;
    }
    return ExpressionNode.literal(result);
  }

  property(prefix: string, occurrence: number): readonly ConditionReport[] {
    return collectReports(this.operands, `${prefix}${this.kind}(${occurrence})/`);
  }

  dispose(): void {
    for (const operand of this.operands) {
      operand.release();
    }
  }
}

class NotData extends ExpressionData {
  readonly kind = "Not";
  readonly operand: ExpressionNode;

  constructor(operand: ExpressionNode) {
    super();
    this.operand = operand.copy();
  }

  get type(): string {
    return "Not";
  }

  evaluate(context: ExecutionContext): ExpressionNode {
    return ExpressionNode.literal(!truthOf(this.operand, context));
  }

  property(prefix: string, occurrence: number): readonly ConditionReport[] {
    return collectReports([this.operand], `${prefix}Not(${occurrence})/`);
  }

  dispose(): void {
    this.operand.release();
  }
}

/**
 * A call into a condition or action module. The module is bound when the
 * node is built and stays bound for the node's lifetime: its internal
 * state (latches, one-shot actions) lives as long as the node does.
 */
class ProcedureData extends ExpressionData {
  readonly kind = "Procedure";

  constructor(
    readonly document: ProcedureDocument,
    readonly module: ProcedureModule
  ) {
    super();
  }

  get type(): string {
    return this.module.type;
  }

  evaluate(context: ExecutionContext): ExpressionNode {
    return ExpressionNode.literal(this.module.update(context));
  }

  property(prefix: string, occurrence: number): readonly ConditionReport[] {
    if (this.module.name === "") {
      this.module.rename(`${prefix}${this.module.type}(${occurrence})`);
    }
    return [this.module.property()];
  }

  dispose(): void {
    this.module.dispose?.();
  }
}

// ─── Helpers ───────────────────────────────────────────────────────

/** Evaluates a node to a boolean and drops the intermediate result. */
function truthOf(node: ExpressionNode, context: ExecutionContext): boolean {
  const result = node.evaluate(context);
  const value = result.toBool();
  result.release();
  return value;
}

/** Reports of sibling nodes, each numbered among siblings of its type. */
function collectReports(
  operands: readonly ExpressionNode[],
  prefix: string
): readonly ConditionReport[] {
  const occurrences = new Map<string, number>();
  const reports: ConditionReport[] = [];
  for (const operand of operands) {
    const occurrence = occurrences.get(operand.type) ?? 0;
    occurrences.set(operand.type, occurrence + 1);
    reports.push(...operand.property(prefix, occurrence));
  }
  return reports;
}

// ─── Handle ────────────────────────────────────────────────────────

/**
 * A reference-counted handle onto expression data.
 * Factories copy the operand handles they are given, so callers keep
 * ownership of (and must release) their own handles.
 */
export class ExpressionNode {
  private data: ExpressionData | undefined;
  private released = false;

  private constructor(data?: ExpressionData) {
    if (data) {
      data.references++;
    }
    this.data = data;
  }

  static empty(): ExpressionNode {
    return new ExpressionNode();
  }

  static literal(value: LiteralValue): ExpressionNode {
    return new ExpressionNode(new LiteralData(value));
  }

  static all(operands: readonly ExpressionNode[]): ExpressionNode {
    return new ExpressionNode(new LogicalData("All", operands));
  }

  static any(operands: readonly ExpressionNode[]): ExpressionNode {
    return new ExpressionNode(new LogicalData("Any", operands));
  }

  static not(operand: ExpressionNode): ExpressionNode {
    return new ExpressionNode(new NotData(operand));
  }

  /** A leaf over a configured module; `document` is the fragment it was configured from. */
  static procedure(document: ProcedureDocument, module: ProcedureModule): ExpressionNode {
    return new ExpressionNode(new ProcedureData(document, module));
  }

  get kind(): ExpressionKind {
    return this.data?.kind ?? "Empty";
  }

  get type(): string {
    return this.data?.type ?? "Expression";
  }

  /** Number of live handles sharing this node's data; 0 for empty or released handles. */
  get referenceCount(): number {
    return this.data?.references ?? 0;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** The literal value, or undefined for any other kind. */
  get value(): LiteralValue | undefined {
    return this.data instanceof LiteralData ? this.data.value : undefined;
  }

  /** Child nodes of a combinator, in declaration order. */
  get children(): readonly ExpressionNode[] {
    if (this.data instanceof LogicalData) {
      return this.data.children;
    }
    if (this.data instanceof NotData) {
      return [this.data.operand];
    }
    return [];
  }

  /** The bound module of a procedure node. */
  get module(): ProcedureModule | undefined {
    return this.data instanceof ProcedureData ? this.data.module : undefined;
  }

  /** The document fragment a procedure node was built from. */
  get document(): ProcedureDocument | undefined {
    return this.data instanceof ProcedureData ? this.data.document : undefined;
  }

  sharesBackingWith(other: ExpressionNode): boolean {
    return this.data !== undefined && this.data === other.data;
  }

  /** A new handle onto the same data. */
  copy(): ExpressionNode {
    this.assertLive("copy");
    return new ExpressionNode(this.data);
  }

  /** Drops this handle; the last handle to go disposes the shared data. */
  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    const data = this.data;
    this.data = undefined;
    if (data && --data.references === 0) {
      data.dispose();
    }
  }

  /**
   * Evaluates the node for the current tick. The result is a literal
   * (or an empty node for an empty one) owned by the caller.
   *
   * @throws {EvaluationError} if the handle was released.
   */
  evaluate(context: ExecutionContext): ExpressionNode {
    this.assertLive("evaluate");
    return this.data ? this.data.evaluate(context, this) : ExpressionNode.empty();
  }

  toBool(): boolean {
    return this.data ? this.data.toBool() : false;
  }

  /** Flat diagnostic report of every procedure leaf under this node. */
  property(prefix = "", occurrence = 0): readonly ConditionReport[] {
    return this.data ? this.data.property(prefix, occurrence) : [];
  }

  private assertLive(operation: string): void {
    if (this.released) {
      throw new EvaluationError(`Cannot ${operation} a released expression node`);
    }
  }
}
