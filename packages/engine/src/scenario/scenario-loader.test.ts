import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { fileURLToPath } from "node:url";
import {
  createScenario,
  loadScenario,
  loadScenarioFile,
  parseScenario,
  parseScenarioYaml,
} from "./scenario-loader.js";
import { unwrap } from "../context/execution-context.js";
import { ConfigurationError } from "../errors.js";
import { RecordingSimulator } from "../__mocks__/recording-simulator.js";

// ─── Test Helpers ──────────────────────────────────────────────────

function scenarioPath(file: string): string {
  return fileURLToPath(new URL(`../../../../scenarios/${file}`, import.meta.url));
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

let simulator: RecordingSimulator;

beforeEach(() => {
  simulator = new RecordingSimulator();
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Parsing ───────────────────────────────────────────────────────

describe("parseScenarioYaml", () => {
  it("parses and validates a document", () => {
    const document = parseScenarioYaml(
      ["Condition:", "  Success: true", "  Failure:", "    Not: 1"].join("\n")
    );

    expect(document.Condition).toEqual({ Success: true, Failure: { Not: 1 } });
  });

  it("rejects text that is not YAML", () => {
    expect(() => parseScenarioYaml("Condition: [unclosed")).toThrow(
      "Scenario is not valid YAML:"
    );
  });

  it("rejects a document missing a criterion", () => {
    expect(() => parseScenarioYaml("Condition:\n  Success: true\n")).toThrow(
      "Invalid scenario document: Condition.Failure: "
    );
  });
});

describe("parseScenario", () => {
  it("attaches the issues and the failing fragment", () => {
    const error = captureError(() =>
      parseScenario({
        Intersection: [{ Name: "Main", InitialState: "Red", Control: [] }],
        Condition: { Success: true, Failure: false },
      })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      expect(error.issues).toEqual([
        "Intersection.0.Control: Array must contain at least 1 element(s)",
      ]);
      expect(error.fragment).toEqual([]);
    }
  });
});

describe("loadScenarioFile", () => {
  it("requires the scenario extension", async () => {
    await expect(loadScenarioFile("red-to-green.yaml")).rejects.toThrow(
      "Scenario file must have a .scenario.yaml or .scenario.yml extension: red-to-green.yaml"
    );
  });

  it("wraps a read failure", async () => {
    await expect(loadScenarioFile(scenarioPath("missing.scenario.yaml"))).rejects.toThrow(
      "Failed to read scenario file:"
    );
  });

  it("reads a scenario from disk", async () => {
    const document = await loadScenarioFile(scenarioPath("red-to-green.scenario.yaml"));

    expect(document.Entity).toEqual([{ Name: "ego", Type: "Ego" }]);
    expect(document.Intersection?.[0]?.Name).toBe("RedToGreen");
  });
});

// ─── Construction ──────────────────────────────────────────────────

describe("createScenario", () => {
  it("fails before any tick on an unknown procedure type", () => {
    const document = parseScenario({
      Condition: { Success: { All: [true, { Type: "Bogus" }] }, Failure: false },
    });

    expect(() => createScenario(document)).toThrow(
      'Failed to load procedure of type "Bogus": no module named "BogusCondition" or "BogusAction"'
    );
  });

  it("requires a simulator when intersections are declared", () => {
    const document = parseScenario({
      Intersection: [
        {
          Name: "Main",
          InitialState: "Red",
          Control: [{ StateName: "Red", TrafficLight: [{ Id: 1, Color: "Red" }] }],
        },
      ],
      Condition: { Success: true, Failure: false },
    });

    expect(() => createScenario(document)).toThrow(
      "Intersections require a simulator to drive their signals"
    );
  });

  it("rejects a criterion naming an undeclared intersection", () => {
    const document = parseScenario({
      Condition: {
        Success: { Type: "IntersectionState", Intersection: "Nowhere", State: "Green" },
        Failure: false,
      },
    });

    const error = captureError(() => createScenario(document, { simulator }));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof Error) {
      expect(error.message).toContain(
        'Syntax error: malformed procedure "IntersectionState". Unknown intersection: "Nowhere"'
      );
    }
  });

  it("checks Speed triggers against the declared entities", () => {
    const document = parseScenario({
      Entity: [{ Name: "ego", Type: "Ego" }],
      Condition: { Success: { Type: "Speed", Trigger: "bus", Min: 1 }, Failure: false },
    });

    expect(() => createScenario(document, { simulator })).toThrow(
      'Syntax error: malformed procedure "Speed". Unknown entity: "bus"'
    );
  });

  it("runs literal criteria without a simulator", () => {
    const scenario = createScenario(parseScenario({ Condition: { Success: 1, Failure: 0 } }));

    expect(scenario.evaluator.tick()).toBe("succeeded");
  });
});

// ─── End to End ────────────────────────────────────────────────────

describe("loadScenario", () => {
  it("succeeds once the light is green and the ego moves", async () => {
    const scenario = await loadScenario(scenarioPath("red-to-green.scenario.yaml"), {
      simulator,
    });
    const { evaluator } = scenario;
    simulator.speeds.set("ego", 0);

    expect(evaluator.tick()).toBe("running");
    expect(simulator.commands).toEqual(["setColor(1, red)", "resetArrows(1)"]);

    unwrap(scenario.context.intersections()).get("RedToGreen").transitionTo("Green");
    simulator.speeds.set("ego", 3);
    simulator.time = 4;

    expect(evaluator.tick()).toBe("succeeded");
    expect(evaluator.report()).toEqual({
      verdict: "succeeded",
      tick: 2,
      success: [
        { name: "Success/All(0)/IntersectionState(0)", type: "IntersectionState", value: true },
        { name: "Success/All(0)/Speed(0)", type: "Speed", value: true },
      ],
      failure: [{ name: "Failure/Timeout(0)", type: "Timeout", value: false }],
    });

    scenario.dispose();
  });

  it("fails when the timeout elapses first", async () => {
    const { evaluator } = await loadScenario(scenarioPath("red-to-green.scenario.yaml"), {
      simulator,
    });
    simulator.speeds.set("ego", 0);
    simulator.time = 30;

    expect(evaluator.tick()).toBe("failed");
  });

  it("lets an action drive the intersection within a tick", async () => {
    const { evaluator } = await loadScenario(scenarioPath("signal-override.scenario.yaml"), {
      simulator,
    });

    expect(evaluator.tick()).toBe("succeeded");
    expect(simulator.commands).toEqual([
      "resetColor(7)",
      "resetArrows(7)",
      "setColor(7, green)",
      "resetArrows(7)",
      "setArrow(7, left)",
      "setArrow(7, straight)",
    ]);
    expect(evaluator.report().success).toEqual([
      {
        name: "Success/All(0)/ChangeIntersection(0)",
        type: "ChangeIntersection",
        value: true,
      },
      { name: "crossing-green", type: "IntersectionState", value: true },
    ]);
  });
});
