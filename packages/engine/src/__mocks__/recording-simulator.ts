// ─── Recording Simulator ───────────────────────────────────────────
// In-process stand-in for the simulator API used by tests.
// Records every actuator command in call order and serves telemetry
// from plain fields the test sets.

import type { SignalArrow, SignalColor, SimulatorApi } from "../context/simulator-api.js";

export class RecordingSimulator implements SimulatorApi {
  readonly commands: string[] = [];

  /** Signal ids whose commands return false. */
  readonly rejectedSignals = new Set<number>();

  /** Signal ids whose commands throw. */
  readonly brokenSignals = new Set<number>();

  time = 0;

  readonly speeds = new Map<string, number>();

  setColor(signalId: number, color: SignalColor): boolean {
    return this.record(signalId, `setColor(${signalId}, ${color})`);
  }

  resetColor(signalId: number): boolean {
    return this.record(signalId, `resetColor(${signalId})`);
  }

  setArrow(signalId: number, arrow: SignalArrow): boolean {
    return this.record(signalId, `setArrow(${signalId}, ${arrow})`);
  }

  resetArrows(signalId: number): boolean {
    return this.record(signalId, `resetArrows(${signalId})`);
  }

  currentTime(): number {
    return this.time;
  }

  speedOf(entity: string): number | undefined {
    return this.speeds.get(entity);
  }

  private record(signalId: number, command: string): boolean {
    this.commands.push(command);
    if (this.brokenSignals.has(signalId)) {
      throw new Error(`Signal ${signalId} is not connected`);
    }
    return !this.rejectedSignals.has(signalId);
  }
}
