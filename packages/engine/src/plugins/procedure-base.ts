// ─── Procedure Base ────────────────────────────────────────────────
// Shared behaviour of the builtin modules: zod-validated configuration,
// the report name, and the `Keep` latch (once true, stays true).

import { z } from "zod";
import {
  describeZodIssues,
  formatZodIssues,
  type ProcedureDocument,
} from "@scenario-runner/schema";
import { ConfigurationError, EvaluationError } from "../errors.js";
import type { ExecutionContext } from "../context/execution-context.js";
import type { ConditionReport, ProcedureModule } from "./procedure-module.js";

const CommonConfigSchema = z.object({
  Name: z.string().min(1).optional(),
  Keep: z.boolean().optional(),
});

export abstract class ProcedureBase<TConfig> implements ProcedureModule {
  private reportName = "";
  private latest = false;
  private keep = false;
  private settings: TConfig | undefined;

  protected constructor(
    readonly type: string,
    private readonly schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>
  ) {}

  get name(): string {
    return this.reportName;
  }

  get result(): boolean {
    return this.latest;
  }

  rename(name: string): string {
    this.reportName = name;
    return name;
  }

  configure(config: ProcedureDocument, context: ExecutionContext): void {
    const common = this.parse(CommonConfigSchema, config);
    const settings = this.parse(this.schema, config);
    this.validate(settings, context);

    this.reportName = common.Name ?? "";
    this.keep = common.Keep ?? false;
    this.settings = settings;
  }

  update(context: ExecutionContext): boolean {
    if (this.settings === undefined) {
      throw new EvaluationError(`${this.type} was updated before being configured`);
    }
    if (this.keep && this.latest) {
      return true;
    }
    this.latest = this.check(this.settings, context);
    return this.latest;
  }

  property(): ConditionReport {
    return { name: this.reportName, type: this.type, value: this.latest };
  }

  /**
   * Cross-checks the configuration against collaborators present at build
   * time. Throws ConfigurationError on a dangling reference.
   */
  protected validate(_config: TConfig, _context: ExecutionContext): void {}

  /** Computes this tick's result. */
  protected abstract check(config: TConfig, context: ExecutionContext): boolean;

  private parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    config: ProcedureDocument
  ): T {
    const result = schema.safeParse(config);
    if (!result.success) {
      throw new ConfigurationError(
        formatZodIssues(result.error.issues, `${this.type} configuration`),
        undefined,
        describeZodIssues(result.error.issues)
      );
    }
    return result.data;
  }
}
