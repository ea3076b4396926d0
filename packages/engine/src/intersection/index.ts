export {
  IntersectionController,
  BLANK_STATE,
  toSignalAssignment,
  type SignalAssignment,
  type SignalCommandFailure,
  type TransitionResult,
} from "./intersection-controller.js";
export { IntersectionRegistry } from "./intersection-registry.js";
