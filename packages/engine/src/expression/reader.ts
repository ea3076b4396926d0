// ─── Expression Reader ─────────────────────────────────────────────
// Builds an expression tree bottom-up from a validated document.
// Any failure aborts the whole build: nodes created so far are released
// and a ConfigurationError naming the offending fragment is thrown.

import type {
  AllDocument,
  AnyDocument,
  ExpressionDocument,
  NotDocument,
  OperandDocuments,
  ProcedureDocument,
} from "@scenario-runner/schema";
import { ConfigurationError } from "../errors.js";
import type { ExecutionContext } from "../context/execution-context.js";
import type { ProcedureDispatcher } from "./dispatch.js";
import { ExpressionNode } from "./expression-node.js";

export interface ReadOptions {
  readonly context: ExecutionContext;
  readonly dispatcher: ProcedureDispatcher;
}

/**
 * Reads an expression document into a tree.
 *
 * @throws {ConfigurationError} on a malformed fragment or an unresolvable procedure.
 */
export function readExpression(
  document: ExpressionDocument,
  options: ReadOptions
): ExpressionNode {
  if (typeof document === "boolean" || typeof document === "number") {
    return ExpressionNode.literal(document);
  }
  if (isProcedure(document)) {
    return options.dispatcher.dispatch(document, options.context);
  }
  if (isAll(document)) {
    return readLogical("All", document.All, options);
  }
  if (isAny(document)) {
    return readLogical("Any", document.Any, options);
  }
  if (isNot(document)) {
    const operand = readExpression(document.Not, options);
    const node = ExpressionNode.not(operand);
    operand.release();
    return node;
  }
  throw new ConfigurationError("Syntax error: malformed expression", document);
}

function readLogical(
  kind: "All" | "Any",
  documents: OperandDocuments,
  options: ReadOptions
): ExpressionNode {
  const operands: ExpressionNode[] = [];
  try {
    for (const each of isSequence(documents) ? documents : [documents]) {
      operands.push(readExpression(each, options));
    }
    return kind === "All" ? ExpressionNode.all(operands) : ExpressionNode.any(operands);
  } finally {
    for (const operand of operands) {
      operand.release();
    }
  }
}

// Combinator schemas are strict, so an object with a string `Type` can only
// have passed validation as a procedure leaf; it is checked first.

function isAll(document: object): document is AllDocument {
  return "All" in document;
}

function isAny(document: object): document is AnyDocument {
  return "Any" in document;
}

function isNot(document: object): document is NotDocument {
  return "Not" in document;
}

function isSequence(documents: OperandDocuments): documents is readonly ExpressionDocument[] {
  return Array.isArray(documents);
}

function isProcedure(document: object): document is ProcedureDocument {
  return "Type" in document && typeof document.Type === "string";
}
