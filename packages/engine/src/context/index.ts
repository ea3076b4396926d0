export {
  ExecutionContext,
  unwrap,
  type ExecutionContextInit,
  type Lookup,
} from "./execution-context.js";
export { EntityRegistry } from "./entity-registry.js";
export type { SignalArrow, SignalColor, SimulatorApi } from "./simulator-api.js";
