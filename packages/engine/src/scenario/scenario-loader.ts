// ─── Scenario Loader ───────────────────────────────────────────────
// Turns a .scenario.yaml document into a ready-to-tick evaluator:
// YAML text → validated document → context (entities, intersections)
// → success and failure trees. Every step fails fast with a
// ConfigurationError; nothing partially built is handed out.

import { readFile } from "node:fs/promises";
import YAML, { YAMLParseError } from "yaml";
import {
  describeZodIssues,
  formatZodIssues,
  safeParseScenarioDocument,
  type ScenarioDocument,
} from "@scenario-runner/schema";
import { ConfigurationError } from "../errors.js";
import { EntityRegistry } from "../context/entity-registry.js";
import { ExecutionContext } from "../context/execution-context.js";
import type { SimulatorApi } from "../context/simulator-api.js";
import { ProcedureDispatcher } from "../expression/dispatch.js";
import { readExpression } from "../expression/reader.js";
import { IntersectionRegistry } from "../intersection/intersection-registry.js";
import { createDefaultRegistry } from "../plugins/builtins.js";
import type { PluginRegistry } from "../plugins/plugin-registry.js";
import { ScenarioEvaluator } from "./scenario-evaluator.js";

const SCENARIO_EXTENSIONS = [".scenario.yaml", ".scenario.yml"];

export interface ScenarioOptions {
  readonly simulator?: SimulatorApi;
  /** Defaults to a registry of the builtin modules. */
  readonly registry?: PluginRegistry;
  /** Defaults to the entities the document declares. */
  readonly entities?: EntityRegistry;
}

export interface Scenario {
  readonly evaluator: ScenarioEvaluator;
  readonly context: ExecutionContext;
  /** Releases both criteria trees and drops the intersection controllers. */
  dispose(): void;
}

// ─── Parsing ───────────────────────────────────────────────────────

/**
 * Validates raw document data into a trusted ScenarioDocument.
 * This is the parse boundary — after this, the document is guaranteed valid.
 *
 * @throws {ConfigurationError} carrying the formatted issues and the
 *   fragment at the first failing path.
 */
export function parseScenario(raw: unknown): ScenarioDocument {
  const result = safeParseScenarioDocument(raw);
  if (!result.success) {
    const { issues } = result.error;
    throw new ConfigurationError(
      formatZodIssues(issues),
      fragmentAt(raw, issues[0]?.path ?? []),
      describeZodIssues(issues)
    );
  }
  return result.data;
}

/** Parses YAML text, then validates it. */
export function parseScenarioYaml(text: string): ScenarioDocument {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigurationError(`Scenario is not valid YAML: ${error.message}`);
    }
    throw error;
  }
  return parseScenario(raw);
}

/**
 * Reads and validates a .scenario.yaml file.
 *
 * @throws {ConfigurationError} on a wrong extension, an unreadable file, or an invalid document.
 */
export async function loadScenarioFile(filePath: string): Promise<ScenarioDocument> {
  if (!SCENARIO_EXTENSIONS.some((extension) => filePath.endsWith(extension))) {
    throw new ConfigurationError(
      `Scenario file must have a ${SCENARIO_EXTENSIONS.join(" or ")} extension: ${filePath}`
    );
  }

  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read scenario file: ${message}`);
  }

  return parseScenarioYaml(text);
}

// ─── Construction ──────────────────────────────────────────────────

/**
 * Builds the execution context and both criteria trees for a document.
 *
 * @throws {ConfigurationError} if any intersection, entity, or procedure
 *   cannot be built.
 */
export function createScenario(
  document: ScenarioDocument,
  options: ScenarioOptions = {}
): Scenario {
  const context = new ExecutionContext({
    api: options.simulator,
    entities: options.entities ?? new EntityRegistry(document.Entity ?? []),
  });

  // Always defined, so a criterion naming an undeclared intersection fails here.
  const intersections = new IntersectionRegistry(document.Intersection, options.simulator);
  context.defineIntersections(intersections);

  const readOptions = {
    context,
    dispatcher: new ProcedureDispatcher(options.registry ?? createDefaultRegistry()),
  };

  const success = readExpression(document.Condition.Success, readOptions);
  try {
    const failure = readExpression(document.Condition.Failure, readOptions);
    const evaluator = new ScenarioEvaluator({ success, failure }, context);
    failure.release();

    return {
      evaluator,
      context,
      dispose() {
        evaluator.dispose();
        intersections.dispose();
      },
    };
  } finally {
    success.release();
  }
}

/** Reads a scenario file and builds it. */
export async function loadScenario(
  filePath: string,
  options: ScenarioOptions = {}
): Promise<Scenario> {
  return createScenario(await loadScenarioFile(filePath), options);
}

// ─── Helpers ───────────────────────────────────────────────────────

/** The deepest value present along `path`, for error messages. */
function fragmentAt(raw: unknown, path: readonly (string | number)[]): unknown {
  let current = raw;
  for (const key of path) {
    if (current === null || typeof current !== "object") {
      break;
    }
    const next: unknown = Reflect.get(current, key);
    if (next === undefined) {
      break;
    }
    current = next;
  }
  return current;
}
