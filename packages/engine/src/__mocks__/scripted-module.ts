// ─── Scripted Module ───────────────────────────────────────────────
// A procedure module for tests: returns a fixed sequence of results,
// counts its updates, and records update order into a shared log.

import type { ProcedureDocument } from "@scenario-runner/schema";
import type { ConditionReport, ProcedureModule } from "../plugins/procedure-module.js";

export class ScriptedModule implements ProcedureModule {
  name = "";
  result = false;
  updates = 0;
  disposed = false;

  /**
   * @param script - Results for successive updates; the last one repeats.
   * @param log - Receives `type` on every update.
   */
  constructor(
    readonly type: string,
    private readonly script: readonly boolean[] = [true],
    private readonly log: string[] = []
  ) {}

  rename(name: string): string {
    this.name = name;
    return name;
  }

  configure(config: ProcedureDocument): void {
    if (config.Name !== undefined) {
      this.name = config.Name;
    }
  }

  update(): boolean {
    const index = Math.min(this.updates, this.script.length - 1);
    this.result = this.script[index] ?? false;
    this.updates++;
    this.log.push(this.type);
    return this.result;
  }

  property(): ConditionReport {
    return { name: this.name, type: this.type, value: this.result };
  }

  dispose(): void {
    this.disposed = true;
  }
}
