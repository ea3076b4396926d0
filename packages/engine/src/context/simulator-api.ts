// ─── Simulator API ─────────────────────────────────────────────────
// The subset of the simulator the engine drives and observes.
// Actuator commands report success as a boolean; a command may also
// throw when the simulator rejects it outright.

/** Signal colors on the simulator side. */
export type SignalColor = "red" | "yellow" | "green";

/** Signal arrows on the simulator side. */
export type SignalArrow = "left" | "right" | "straight";

export interface SimulatorApi {
  setColor(signalId: number, color: SignalColor): boolean;
  resetColor(signalId: number): boolean;
  setArrow(signalId: number, arrow: SignalArrow): boolean;
  resetArrows(signalId: number): boolean;

  /** Simulation time in seconds. */
  currentTime(): number;

  /** Speed of the named entity in m/s, or undefined if the simulator has no telemetry for it. */
  speedOf(entity: string): number | undefined;
}
