// ─── Plugin Registry ───────────────────────────────────────────────
// Name-keyed factories for condition and action modules. The engine only
// depends on the PluginRegistry interface; ModuleRegistry is the
// in-process implementation the loader uses by default.

import type { ProcedureModule } from "./procedure-module.js";

export interface PluginRegistry {
  /** A fresh module instance for the name, or undefined if none is registered. */
  resolve(name: string): ProcedureModule | undefined;
  declaredNames(): ReadonlySet<string>;
}

/** Creates a new, unconfigured module instance. */
export type ModuleFactory = () => ProcedureModule;

export class ModuleRegistry implements PluginRegistry {
  private readonly factories = new Map<string, ModuleFactory>();

  /**
   * Registers a module factory under its full name (e.g. "TimeoutCondition").
   * Overwrites any existing factory with the same name.
   */
  register(name: string, factory: ModuleFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  /**
   * Removes a module factory.
   * Returns true if the factory existed, false otherwise.
   */
  unregister(name: string): boolean {
    return this.factories.delete(name);
  }

  resolve(name: string): ProcedureModule | undefined {
    const factory = this.factories.get(name);
    return factory?.();
  }

  declaredNames(): ReadonlySet<string> {
    return new Set(this.factories.keys());
  }
}
