// ─── Intersection Registry ─────────────────────────────────────────
// Owns every intersection controller of a scenario, keyed by name.

import type { IntersectionConfig } from "@scenario-runner/schema";
import { ConfigurationError } from "../errors.js";
import type { SimulatorApi } from "../context/simulator-api.js";
import { IntersectionController } from "./intersection-controller.js";

export class IntersectionRegistry {
  private readonly controllersByName = new Map<string, IntersectionController>();

  /**
   * @throws {ConfigurationError} on a duplicate name, an invalid state
   *   machine, or intersections declared without a simulator to drive them.
   */
  constructor(configs: readonly IntersectionConfig[] = [], simulator?: SimulatorApi) {
    for (const config of configs) {
      if (!simulator) {
        throw new ConfigurationError(
          "Intersections require a simulator to drive their signals",
          { Intersection: configs.map((each) => each.Name) }
        );
      }
      if (this.controllersByName.has(config.Name)) {
        throw new ConfigurationError(
          `Duplicate intersection name: "${config.Name}"`,
          config
        );
      }
      this.controllersByName.set(
        config.Name,
        new IntersectionController(config, simulator)
      );
    }
  }

  /** Returns the controller for the given name, or throws. */
  get(name: string): IntersectionController {
    const controller = this.controllersByName.get(name);
    if (!controller) {
      throw new ConfigurationError(`Unknown intersection: "${name}"`);
    }
    return controller;
  }

  find(name: string): IntersectionController | undefined {
    return this.controllersByName.get(name);
  }

  has(name: string): boolean {
    return this.controllersByName.has(name);
  }

  get names(): readonly string[] {
    return Array.from(this.controllersByName.keys());
  }

  /**
   * Ticks every controller in declaration order.
   * Returns true when the last application of every controller had no failures.
   */
  tick(): boolean {
    let applied = true;
    for (const controller of this.controllersByName.values()) {
      applied = controller.tick() && applied;
    }
    return applied;
  }

  /** Drops all controllers at scenario teardown. */
  dispose(): void {
    this.controllersByName.clear();
  }
}
