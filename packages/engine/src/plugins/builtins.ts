// ─── Builtin Modules ───────────────────────────────────────────────
// Condition and action modules shipped with the engine.
// Conditions read simulator or intersection state; the action drives an
// intersection controller.

import { z } from "zod";
import { ConfigurationError, EvaluationError } from "../errors.js";
import { unwrap, type ExecutionContext } from "../context/execution-context.js";
import type { IntersectionController } from "../intersection/intersection-controller.js";
import { ModuleRegistry } from "./plugin-registry.js";
import { ProcedureBase } from "./procedure-base.js";

// ─── Timeout ───────────────────────────────────────────────────────

const TimeoutConfigSchema = z.object({
  /** Seconds of simulation time. */
  Limit: z.number().positive(),
});

type TimeoutConfig = z.infer<typeof TimeoutConfigSchema>;

/** True once simulation time reaches `Limit`. */
export class TimeoutCondition extends ProcedureBase<TimeoutConfig> {
  constructor() {
    super("Timeout", TimeoutConfigSchema);
  }

  protected check(config: TimeoutConfig, context: ExecutionContext): boolean {
    return unwrap(context.api()).currentTime() >= config.Limit;
  }
}

// ─── Speed ─────────────────────────────────────────────────────────

const SpeedConfigSchema = z
  .object({
    Trigger: z.string().min(1),
    Min: z.number().min(0).optional(),
    Max: z.number().min(0).optional(),
  })
  .refine((c) => c.Min !== undefined || c.Max !== undefined, {
    message: "requires Min or Max",
  })
  .refine((c) => c.Min === undefined || c.Max === undefined || c.Min <= c.Max, {
    message: "Min must be <= Max",
  });

type SpeedConfig = z.infer<typeof SpeedConfigSchema>;

/** True while the `Trigger` entity's speed lies within [Min, Max]. */
export class SpeedCondition extends ProcedureBase<SpeedConfig> {
  constructor() {
    super("Speed", SpeedConfigSchema);
  }

  protected validate(config: SpeedConfig, context: ExecutionContext): void {
    const entities = context.entities();
    if (entities.ok && !entities.value.has(config.Trigger)) {
      throw new ConfigurationError(`Unknown entity: "${config.Trigger}"`);
    }
  }

  protected check(config: SpeedConfig, context: ExecutionContext): boolean {
    if (!unwrap(context.entities()).has(config.Trigger)) {
      throw new EvaluationError(`Unknown entity: "${config.Trigger}"`);
    }
    const speed = unwrap(context.api()).speedOf(config.Trigger);
    if (speed === undefined) {
      throw new EvaluationError(`No speed telemetry for entity "${config.Trigger}"`);
    }
    return (
      (config.Min === undefined || speed >= config.Min) &&
      (config.Max === undefined || speed <= config.Max)
    );
  }
}

// ─── Intersections ─────────────────────────────────────────────────

const IntersectionTargetSchema = z.object({
  Intersection: z.string().min(1),
  State: z.string().min(1),
});

type IntersectionTarget = z.infer<typeof IntersectionTargetSchema>;

/** Checks the intersection and state are declared by the scenario. */
function validateTarget(target: IntersectionTarget, context: ExecutionContext): void {
  const intersections = context.intersections();
  if (!intersections.ok) {
    throw new ConfigurationError(`Unknown intersection: "${target.Intersection}"`);
  }
  const controller = intersections.value.get(target.Intersection);
  if (!controller.hasState(target.State)) {
    throw new ConfigurationError(
      `Intersection "${target.Intersection}" has no state "${target.State}"`
    );
  }
}

function controllerFor(
  target: IntersectionTarget,
  context: ExecutionContext
): IntersectionController {
  return unwrap(context.intersections()).get(target.Intersection);
}

/** True while the intersection is in `State`. */
export class IntersectionStateCondition extends ProcedureBase<IntersectionTarget> {
  constructor() {
    super("IntersectionState", IntersectionTargetSchema);
  }

  protected validate(config: IntersectionTarget, context: ExecutionContext): void {
    validateTarget(config, context);
  }

  protected check(config: IntersectionTarget, context: ExecutionContext): boolean {
    return controllerFor(config, context).is(config.State);
  }
}

/**
 * Moves the intersection to `State` on its first update, then reports
 * true without issuing the transition again.
 */
export class ChangeIntersectionAction extends ProcedureBase<IntersectionTarget> {
  private fired = false;

  constructor() {
    super("ChangeIntersection", IntersectionTargetSchema);
  }

  protected validate(config: IntersectionTarget, context: ExecutionContext): void {
    validateTarget(config, context);
  }

  protected check(config: IntersectionTarget, context: ExecutionContext): boolean {
    if (!this.fired) {
      controllerFor(config, context).transitionTo(config.State);
      this.fired = true;
    }
    return true;
  }
}

// ─── Registration ──────────────────────────────────────────────────

/** Registers every builtin module under its full name. */
export function registerAllBuiltins(registry: ModuleRegistry): ModuleRegistry {
  return registry
    .register("TimeoutCondition", () => new TimeoutCondition())
    .register("SpeedCondition", () => new SpeedCondition())
    .register("IntersectionStateCondition", () => new IntersectionStateCondition())
    .register("ChangeIntersectionAction", () => new ChangeIntersectionAction());
}

/** A registry holding the builtin modules only. */
export function createDefaultRegistry(): ModuleRegistry {
  return registerAllBuiltins(new ModuleRegistry());
}
