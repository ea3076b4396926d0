// ─── Schema Validation ─────────────────────────────────────────────
// Zod schemas for runtime validation of .scenario.yaml documents.
// This is the "parse boundary" — raw YAML data enters, typed data exits.

import { z } from "zod";
import type { ExpressionDocument, ScenarioDocument } from "../types/index.js";

export {
  describeZodIssues,
  formatZodIssues,
  type ZodIssueLike,
} from "./format-zod-issues.js";

// ─── Primitives ────────────────────────────────────────────────────

export const ColorSchema = z.enum(["Blank", "Red", "Yellow", "Green"]);

export const ArrowSchema = z.enum(["Blank", "Left", "Right", "Straight"]);

// ─── Intersections ─────────────────────────────────────────────────

const TrafficLightSchema = z.object({
  Id: z.number().int().min(0),
  Color: ColorSchema.optional(),
  Arrows: z.union([z.array(ArrowSchema), ArrowSchema]).nullable().optional(),
  Arrow: ArrowSchema.optional(),
});

const ControlSchema = z.object({
  StateName: z.string().min(1),
  TrafficLight: z.array(TrafficLightSchema),
});

export const IntersectionSchema = z.object({
  Name: z.string().min(1),
  InitialState: z.string().min(1),
  Control: z.array(ControlSchema).min(1),
});

// ─── Entities ──────────────────────────────────────────────────────

const EntitySchema = z.object({
  Name: z.string().min(1),
  Type: z.enum(["Ego", "Vehicle", "Pedestrian"]),
});

// ─── Expressions ───────────────────────────────────────────────────
// Recursive: combinators hold further expressions. Combinator objects are
// strict so a misspelled sibling key is reported instead of ignored.

export const ProcedureSchema = z
  .object({
    Type: z.string().min(1),
    Name: z.string().min(1).optional(),
  })
  .passthrough();

export const ExpressionSchema: z.ZodType<ExpressionDocument> = z.lazy(() =>
  z.union([
    z.boolean(),
    z.number(),
    z.object({ All: OperandsSchema }).strict(),
    z.object({ Any: OperandsSchema }).strict(),
    z.object({ Not: ExpressionSchema }).strict(),
    ProcedureSchema,
  ])
);

const OperandsSchema = z.union([z.array(ExpressionSchema), ExpressionSchema]);

// ─── Complete Scenario Schema ──────────────────────────────────────

export const ScenarioDocumentSchema = z.object({
  Entity: z.array(EntitySchema).optional(),
  Intersection: z.array(IntersectionSchema).optional(),
  Condition: z.object({
    Success: ExpressionSchema,
    Failure: ExpressionSchema,
  }),
});

/** Inferred type from the Zod schema — should match ScenarioDocument. */
export type ParsedScenario = z.infer<typeof ScenarioDocumentSchema>;

/**
 * Parses raw document data into a validated ScenarioDocument.
 * Returns the parsed data or throws a ZodError with detailed issues.
 */
export function parseScenarioDocument(raw: unknown): ScenarioDocument {
  return ScenarioDocumentSchema.parse(raw);
}

/**
 * Safe parse variant — returns a discriminated result instead of throwing.
 */
export function safeParseScenarioDocument(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedScenario> {
  return ScenarioDocumentSchema.safeParse(raw);
}
