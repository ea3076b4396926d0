// ─── Execution Context ─────────────────────────────────────────────
// The collaborators a tick may need: simulator, entities, intersections.
// Each slot is optional; lookups report a missing collaborator as a
// value so modules decide when the absence becomes an error.

import { EvaluationError } from "../errors.js";
import type { IntersectionRegistry } from "../intersection/intersection-registry.js";
import type { EntityRegistry } from "./entity-registry.js";
import type { SimulatorApi } from "./simulator-api.js";

/** Result of looking up a collaborator. Discriminated union. */
export type Lookup<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: EvaluationError };

/** Returns the looked-up value or throws its EvaluationError. */
export function unwrap<T>(lookup: Lookup<T>): T {
  if (!lookup.ok) {
    throw lookup.error;
  }
  return lookup.value;
}

export interface ExecutionContextInit {
  readonly api?: SimulatorApi;
  readonly entities?: EntityRegistry;
  readonly intersections?: IntersectionRegistry;
}

export class ExecutionContext {
  private simulator: SimulatorApi | undefined;
  private entityRegistry: EntityRegistry | undefined;
  private intersectionRegistry: IntersectionRegistry | undefined;

  constructor(init: ExecutionContextInit = {}) {
    this.simulator = init.api;
    this.entityRegistry = init.entities;
    this.intersectionRegistry = init.intersections;
  }

  defineApi(api: SimulatorApi): void {
    this.simulator = api;
  }

  defineEntities(entities: EntityRegistry): void {
    this.entityRegistry = entities;
  }

  defineIntersections(intersections: IntersectionRegistry): void {
    this.intersectionRegistry = intersections;
  }

  api(): Lookup<SimulatorApi> {
    return lookup("api", this.simulator);
  }

  entities(): Lookup<EntityRegistry> {
    return lookup("entities", this.entityRegistry);
  }

  intersections(): Lookup<IntersectionRegistry> {
    return lookup("intersections", this.intersectionRegistry);
  }
}

function lookup<T>(name: string, value: T | undefined): Lookup<T> {
  if (value === undefined) {
    return {
      ok: false,
      error: new EvaluationError(
        `No ${name} defined, but scenario execution requires this.`
      ),
    };
  }
  return { ok: true, value };
}
