export type { ConditionReport, ProcedureModule } from "./procedure-module.js";
export { ModuleRegistry, type ModuleFactory, type PluginRegistry } from "./plugin-registry.js";
export { ProcedureBase } from "./procedure-base.js";
export {
  ChangeIntersectionAction,
  IntersectionStateCondition,
  SpeedCondition,
  TimeoutCondition,
  createDefaultRegistry,
  registerAllBuiltins,
} from "./builtins.js";
