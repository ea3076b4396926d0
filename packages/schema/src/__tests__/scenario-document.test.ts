// ─── Scenario Document Schema Tests ───────────────────────────────
// Validates the parse boundary for .scenario.yaml documents: criteria
// trees, intersection definitions, entity lists, and the deprecated
// scalar `Arrow` key.

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseScenarioDocument, safeParseScenarioDocument } from "../index";

// ─── Helper: Minimal Valid Scenario Factory ───────────────────────

/** Returns a minimal scenario object that passes Zod validation. */
function makeMinimalScenario(
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    Condition: { Success: true, Failure: false },
    ...overrides,
  };
}

function makeIntersection(trafficLight: readonly unknown[]): Record<string, unknown> {
  return {
    Name: "RedToGreen",
    InitialState: "Red",
    Control: [{ StateName: "Red", TrafficLight: trafficLight }],
  };
}

// ─── Group 1: Accepted Documents ──────────────────────────────────

describe("accepted scenario documents", () => {
  it("parses a scenario with literal criteria", () => {
    const result = safeParseScenarioDocument(makeMinimalScenario());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.Condition).toEqual({ Success: true, Failure: false });
    }
  });

  it("keeps module keys next to Type in procedure leaves", () => {
    const scenario = makeMinimalScenario({
      Condition: {
        Success: { All: [{ Type: "Timeout", Limit: 10 }, { Not: 0 }] },
        Failure: { Any: [] },
      },
    });

    const parsed = parseScenarioDocument(scenario);

    expect(parsed.Condition.Success).toEqual({
      All: [{ Type: "Timeout", Limit: 10 }, { Not: 0 }],
    });
  });

  it("accepts a single combinator operand without a sequence", () => {
    const parsed = parseScenarioDocument(
      makeMinimalScenario({
        Condition: { Success: { Any: { Type: "Timeout", Limit: 5 } }, Failure: false },
      })
    );

    expect(parsed.Condition.Success).toEqual({ Any: { Type: "Timeout", Limit: 5 } });
  });

  it("accepts both the Arrows sequence and the deprecated Arrow scalar", () => {
    const scenario = makeMinimalScenario({
      Intersection: [
        makeIntersection([
          { Id: 1, Color: "Green", Arrows: ["Straight", "Left"] },
          { Id: 2, Color: "Red", Arrow: "Right" },
          { Id: 3, Arrows: "Left" },
        ]),
      ],
    });

    const result = safeParseScenarioDocument(scenario);

    expect(result.success).toBe(true);
    if (result.success) {
      const lights = result.data.Intersection?.[0]?.Control[0]?.TrafficLight;
      expect(lights).toEqual([
        { Id: 1, Color: "Green", Arrows: ["Straight", "Left"] },
        { Id: 2, Color: "Red", Arrow: "Right" },
        { Id: 3, Arrows: "Left" },
      ]);
    }
  });

  it("parses an entity list", () => {
    const parsed = parseScenarioDocument(
      makeMinimalScenario({ Entity: [{ Name: "ego", Type: "Ego" }] })
    );

    expect(parsed.Entity).toEqual([{ Name: "ego", Type: "Ego" }]);
  });
});

// ─── Group 2: Rejected Documents ──────────────────────────────────

describe("rejected scenario documents", () => {
  it("rejects a missing failure criterion", () => {
    const result = safeParseScenarioDocument({ Condition: { Success: true } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["Condition", "Failure"]);
    }
  });

  it("rejects a negative signal id", () => {
    const result = safeParseScenarioDocument(
      makeMinimalScenario({ Intersection: [makeIntersection([{ Id: -1 }])] })
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual([
        "Intersection", 0, "Control", 0, "TrafficLight", 0, "Id",
      ]);
    }
  });

  it("rejects an unknown color", () => {
    const result = safeParseScenarioDocument(
      makeMinimalScenario({
        Intersection: [makeIntersection([{ Id: 1, Color: "Purple" }])],
      })
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual([
        "Intersection", 0, "Control", 0, "TrafficLight", 0, "Color",
      ]);
    }
  });

  it("rejects an intersection without states", () => {
    const result = safeParseScenarioDocument(
      makeMinimalScenario({
        Intersection: [{ Name: "Empty", InitialState: "Red", Control: [] }],
      })
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["Intersection", 0, "Control"]);
    }
  });

  it("rejects a leaf without Type", () => {
    const result = safeParseScenarioDocument(
      makeMinimalScenario({ Condition: { Success: { Limit: 3 }, Failure: false } })
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.code).toBe("invalid_union");
      expect(result.error.issues[0]?.path).toEqual(["Condition", "Success"]);
    }
  });

  it("reports a misspelled key next to a combinator", () => {
    const result = safeParseScenarioDocument(
      makeMinimalScenario({
        Condition: { Success: { All: [true], Nmae: "typo" }, Failure: false },
      })
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.code).toBe("unrecognized_keys");
    }
  });

  it("throws a ZodError from the throwing variant", () => {
    expect(() => parseScenarioDocument({})).toThrow(ZodError);
  });
});
