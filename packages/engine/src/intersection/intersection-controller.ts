// ─── Intersection Controller ───────────────────────────────────────
// A finite state machine over one intersection's signal groups.
// Each named state lists the color and arrows of the signals it drives;
// entering a state re-asserts every one of them on the simulator.

import type {
  Arrow,
  Color,
  IntersectionConfig,
  TrafficLightConfig,
} from "@scenario-runner/schema";
import { ConfigurationError } from "../errors.js";
import type {
  SignalArrow,
  SignalColor,
  SimulatorApi,
} from "../context/simulator-api.js";

/** Always a state of every controller; resets the signals unless declared. */
export const BLANK_STATE = "Blank";

const SIGNAL_COLORS: Readonly<Record<Color, SignalColor | undefined>> = {
  Blank: undefined,
  Red: "red",
  Yellow: "yellow",
  Green: "green",
};

const SIGNAL_ARROWS: Readonly<Record<Arrow, SignalArrow | undefined>> = {
  Blank: undefined,
  Left: "left",
  Right: "right",
  Straight: "straight",
};

/** How one signal group is rendered in a state. No color means reset to off. */
export interface SignalAssignment {
  readonly signalId: number;
  readonly color: SignalColor | undefined;
  readonly arrows: readonly SignalArrow[];
}

/** An actuator command the simulator did not acknowledge. */
export interface SignalCommandFailure {
  readonly signalId: number;
  readonly command: string;
  readonly reason: string;
}

/**
 * Outcome of entering a state. The controller is in `state` either way;
 * `applied` is false when some actuator command failed.
 */
export interface TransitionResult {
  readonly state: string;
  readonly applied: boolean;
  readonly failures: readonly SignalCommandFailure[];
}

/**
 * Converts one `TrafficLight` entry into a signal assignment.
 * Blank arrows are dropped; the scalar `Arrow` key is still honoured.
 */
export function toSignalAssignment(
  light: TrafficLightConfig,
  intersection: string
): SignalAssignment {
  let declared: readonly Arrow[];
  if (light.Arrow !== undefined) {
    console.warn(
      `[Intersection] "${intersection}": tag 'Arrow: <String>' is deprecated. Use 'Arrows: [<String>*]'`
    );
    declared = [light.Arrow];
  } else if (light.Arrows === undefined || light.Arrows === null) {
    declared = [];
  } else if (typeof light.Arrows === "string") {
    declared = [light.Arrows];
  } else {
    declared = light.Arrows;
  }

  const arrows: SignalArrow[] = [];
  for (const arrow of declared) {
    const signalArrow = SIGNAL_ARROWS[arrow];
    if (signalArrow !== undefined) {
      arrows.push(signalArrow);
    }
  }

  return {
    signalId: light.Id,
    color: SIGNAL_COLORS[light.Color ?? "Blank"],
    arrows,
  };
}

/**
 * Manages the signal states of one intersection.
 * Constructed from the scenario's intersection definition.
 */
export class IntersectionController {
  readonly name: string;
  private readonly statesByName: ReadonlyMap<string, readonly SignalAssignment[]>;
  private readonly signalIds: readonly number[];
  private state: string;
  // Outcome of the last application; undefined until a state is first applied.
  private lastApplied: boolean | undefined;

  constructor(
    config: IntersectionConfig,
    private readonly simulator: SimulatorApi
  ) {
    this.name = config.Name;

    const states = new Map<string, readonly SignalAssignment[]>();
    const ids = new Set<number>();
    for (const control of config.Control) {
      if (states.has(control.StateName)) {
        throw new ConfigurationError(
          `Intersection "${config.Name}" declares state "${control.StateName}" twice`,
          control
        );
      }
      const assignments = control.TrafficLight.map((light) =>
        toSignalAssignment(light, config.Name)
      );
      for (const assignment of assignments) {
        ids.add(assignment.signalId);
      }
      states.set(control.StateName, assignments);
    }
    this.signalIds = Array.from(ids);

    if (!states.has(BLANK_STATE)) {
      states.set(
        BLANK_STATE,
        this.signalIds.map((signalId) => ({ signalId, color: undefined, arrows: [] }))
      );
    }
    this.statesByName = states;

    if (!states.has(config.InitialState)) {
      throw new ConfigurationError(
        `Intersection "${config.Name}" has unknown initial state "${config.InitialState}"`,
        config
      );
    }
    this.state = config.InitialState;
  }

  get currentState(): string {
    return this.state;
  }

  /** All state names in declaration order, Blank last unless declared. */
  get states(): readonly string[] {
    return Array.from(this.statesByName.keys());
  }

  hasState(state: string): boolean {
    return this.statesByName.has(state);
  }

  is(state: string): boolean {
    return this.state === state;
  }

  /** Signal ids under this intersection's authority, in first-declared order. */
  ids(): readonly number[] {
    return this.signalIds;
  }

  /** Returns the signal assignments of a state, or throws. */
  getState(state: string): readonly SignalAssignment[] {
    const assignments = this.statesByName.get(state);
    if (!assignments) {
      throw new ConfigurationError(
        `Intersection "${this.name}" has no state "${state}"`,
        { Intersection: this.name, State: state }
      );
    }
    return assignments;
  }

  /**
   * Enters `target`, issuing color, arrow reset, then arrow commands for
   * every signal the state declares. Failed commands are logged and the
   * remaining ones still run; the state changes regardless.
   *
   * @throws {ConfigurationError} if `target` is not a state; the current state is kept.
   */
  transitionTo(target: string): TransitionResult {
    const assignments = this.getState(target);

    const failures: SignalCommandFailure[] = [];
    for (const assignment of assignments) {
      this.applyAssignment(assignment, failures);
    }

    this.state = target;
    this.lastApplied = failures.length === 0;
    return { state: target, applied: failures.length === 0, failures };
  }

  /**
   * Applies the initial state on the first tick. Later ticks send nothing:
   * a failed command is reported once and not retried. Returns whether
   * the last application had no failures.
   */
  tick(): boolean {
    if (this.lastApplied === undefined) {
      return this.transitionTo(this.state).applied;
    }
    return this.lastApplied;
  }

  private applyAssignment(
    { signalId, color, arrows }: SignalAssignment,
    failures: SignalCommandFailure[]
  ): void {
    if (color === undefined) {
      this.issue(signalId, `resetColor(${signalId})`, failures, () =>
        this.simulator.resetColor(signalId)
      );
    } else {
      this.issue(signalId, `setColor(${signalId}, ${color})`, failures, () =>
        this.simulator.setColor(signalId, color)
      );
    }

    this.issue(signalId, `resetArrows(${signalId})`, failures, () =>
      this.simulator.resetArrows(signalId)
    );

    for (const arrow of arrows) {
      this.issue(signalId, `setArrow(${signalId}, ${arrow})`, failures, () =>
        this.simulator.setArrow(signalId, arrow)
      );
    }
  }

  private issue(
    signalId: number,
    command: string,
    failures: SignalCommandFailure[],
    send: () => boolean
  ): void {
    let reason: string | undefined;
    try {
      if (!send()) {
        reason = "rejected by simulator";
      }
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }

    if (reason !== undefined) {
      console.warn(
        `[Intersection] "${this.name}": ${command} failed: ${reason}. Continuing with remaining signals.`
      );
      failures.push({ signalId, command, reason });
    }
  }
}
