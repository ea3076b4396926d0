// ─── Scenario Document Types ───────────────────────────────────────
// The declarative shape of a .scenario.yaml file after validation.
// Every section is readonly: documents are never mutated after parse.

// ─── Signals ───────────────────────────────────────────────────────

/** Signal colors as written in scenario documents. */
export type Color = "Blank" | "Red" | "Yellow" | "Green";

/** Signal arrows as written in scenario documents. */
export type Arrow = "Blank" | "Left" | "Right" | "Straight";

/**
 * One signal group's rendering within an intersection state.
 * `Arrow` is the deprecated scalar spelling of `Arrows`.
 */
export interface TrafficLightConfig {
  readonly Id: number;
  readonly Color?: Color;
  readonly Arrows?: readonly Arrow[] | Arrow | null;
  readonly Arrow?: Arrow;
}

/** A named intersection state and the signal groups it drives. */
export interface ControlConfig {
  readonly StateName: string;
  readonly TrafficLight: readonly TrafficLightConfig[];
}

export interface IntersectionConfig {
  readonly Name: string;
  readonly InitialState: string;
  readonly Control: readonly ControlConfig[];
}

// ─── Entities ──────────────────────────────────────────────────────

export type EntityKind = "Ego" | "Vehicle" | "Pedestrian";

export interface EntityConfig {
  readonly Name: string;
  readonly Type: EntityKind;
}

// ─── Expressions ───────────────────────────────────────────────────

/**
 * A leaf that calls a condition or action module.
 * Keys other than `Type` and `Name` belong to the module.
 */
export interface ProcedureDocument {
  readonly Type: string;
  readonly Name?: string;
  readonly [key: string]: unknown;
}

/** Operands of `All` and `Any`; a single operand may be written without a sequence. */
export type OperandDocuments = readonly ExpressionDocument[] | ExpressionDocument;

export interface AllDocument {
  readonly All: OperandDocuments;
}

export interface AnyDocument {
  readonly Any: OperandDocuments;
}

export interface NotDocument {
  readonly Not: ExpressionDocument;
}

export type ExpressionDocument =
  | boolean
  | number
  | AllDocument
  | AnyDocument
  | NotDocument
  | ProcedureDocument;

// ─── Complete Scenario ─────────────────────────────────────────────

export interface CriteriaConfig {
  readonly Success: ExpressionDocument;
  readonly Failure: ExpressionDocument;
}

export interface ScenarioDocument {
  readonly Entity?: readonly EntityConfig[];
  readonly Intersection?: readonly IntersectionConfig[];
  readonly Condition: CriteriaConfig;
}
