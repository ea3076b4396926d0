// ─── Scenario Evaluator ────────────────────────────────────────────
// Drives a scenario tick by tick: evaluates the success and failure
// criteria against the shared context and reduces them to a verdict.
// Once the verdict is terminal (or the run is aborted) no tree is
// evaluated again.

import { ScenarioStateError } from "../errors.js";
import type { ExecutionContext } from "../context/execution-context.js";
import type { ExpressionNode } from "../expression/expression-node.js";
import type { ConditionReport } from "../plugins/procedure-module.js";

export type Verdict = "running" | "succeeded" | "failed";

export interface ScenarioReport {
  readonly verdict: Verdict;
  readonly tick: number;
  readonly success: readonly ConditionReport[];
  readonly failure: readonly ConditionReport[];
}

export interface ScenarioCriteria {
  readonly success: ExpressionNode;
  readonly failure: ExpressionNode;
}

/** Reduces one tick's results; failure takes precedence over success. */
export function reduceVerdict(succeeded: boolean, failed: boolean): Verdict {
  if (failed) {
    return "failed";
  }
  return succeeded ? "succeeded" : "running";
}

export class ScenarioEvaluator {
  private readonly success: ExpressionNode;
  private readonly failure: ExpressionNode;
  private currentVerdict: Verdict = "running";
  private ticks = 0;
  private aborted = false;

  /** Takes shared handles on both criteria; the caller keeps its own. */
  constructor(
    criteria: ScenarioCriteria,
    private readonly context: ExecutionContext
  ) {
    this.success = criteria.success.copy();
    this.failure = criteria.failure.copy();
  }

  get verdict(): Verdict {
    return this.currentVerdict;
  }

  /** Number of completed ticks. */
  get tickCount(): number {
    return this.ticks;
  }

  get isTerminated(): boolean {
    return this.aborted || this.currentVerdict !== "running";
  }

  /**
   * Runs one tick. Intersections apply their initial state on the first tick,
   * then the success tree and the failure tree are evaluated in full.
   * Errors from either tree propagate and leave the verdict unchanged.
   *
   * @throws {ScenarioStateError} if the scenario already terminated or was aborted.
   */
  tick(): Verdict {
    if (this.aborted) {
      throw new ScenarioStateError("Scenario was aborted; no further ticks are evaluated");
    }
    if (this.currentVerdict !== "running") {
      throw new ScenarioStateError(
        `Scenario already ${this.currentVerdict} after ${this.ticks} tick(s)`
      );
    }

    const intersections = this.context.intersections();
    if (intersections.ok) {
      intersections.value.tick();
    }

    const succeeded = evaluateCriterion(this.success, this.context);
    const failed = evaluateCriterion(this.failure, this.context);

    this.ticks++;
    this.currentVerdict = reduceVerdict(succeeded, failed);
    return this.currentVerdict;
  }

  /** Stops the run between ticks. */
  abort(): void {
    this.aborted = true;
  }

  report(): ScenarioReport {
    return {
      verdict: this.currentVerdict,
      tick: this.ticks,
      success: this.success.property("Success/"),
      failure: this.failure.property("Failure/"),
    };
  }

  /** Releases both criteria trees. The evaluator cannot tick afterwards. */
  dispose(): void {
    this.aborted = true;
    this.success.release();
    this.failure.release();
  }
}

function evaluateCriterion(root: ExpressionNode, context: ExecutionContext): boolean {
  const result = root.evaluate(context);
  const value = result.toBool();
  result.release();
  return value;
}
