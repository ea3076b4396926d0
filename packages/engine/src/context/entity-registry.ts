// ─── Entity Registry ───────────────────────────────────────────────
// Names of the entities a scenario declares. Condition modules check
// their references against it; telemetry itself comes from the simulator.

import type { EntityConfig, EntityKind } from "@scenario-runner/schema";
import { ConfigurationError } from "../errors.js";

export class EntityRegistry {
  private readonly entitiesByName = new Map<string, EntityKind>();

  constructor(entities: readonly EntityConfig[] = []) {
    for (const entity of entities) {
      this.add(entity);
    }
  }

  /** @throws {ConfigurationError} on a duplicate name. */
  add(entity: EntityConfig): void {
    if (this.entitiesByName.has(entity.Name)) {
      throw new ConfigurationError(`Duplicate entity name: "${entity.Name}"`, entity);
    }
    this.entitiesByName.set(entity.Name, entity.Type);
  }

  has(name: string): boolean {
    return this.entitiesByName.has(name);
  }

  kindOf(name: string): EntityKind | undefined {
    return this.entitiesByName.get(name);
  }

  /** Entity names in declaration order. */
  get names(): readonly string[] {
    return Array.from(this.entitiesByName.keys());
  }
}
