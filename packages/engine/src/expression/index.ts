export { ExpressionNode, type ExpressionKind, type LiteralValue } from "./expression-node.js";
export { ProcedureDispatcher, PROCEDURE_SUFFIXES } from "./dispatch.js";
export { readExpression, type ReadOptions } from "./reader.js";
