import type {
  CommandKind,
  DronePhase,
  StateChange,
  Telemetry,
  TransitionCause,
} from "../shared/types.ts";
import { GatewayError } from "./errors.ts";

/**
 * Phase reached when a command of the given kind is acknowledged.
 * A missing entry means the command is illegal from that phase.
 */
const commandTransitions: Record<
  DronePhase,
  Partial<Record<CommandKind, DronePhase>>
> = {
  Idle: { Arm: "Armed", EmergencyStop: "Fault" },
  Armed: { Disarm: "Idle", Takeoff: "Flying", EmergencyStop: "Fault" },
  Flying: { Land: "Landing", Move: "Flying", EmergencyStop: "Fault" },
  Landing: { EmergencyStop: "Fault" },
  Fault: { EmergencyStop: "Fault" },
};

export function nextPhase(from: DronePhase, kind: CommandKind) {
  return commandTransitions[from][kind] ?? null;
}

export function isCommandAllowed(from: DronePhase, kind: CommandKind) {
  return nextPhase(from, kind) !== null;
}

export const isAirborne = (phase: DronePhase) =>
  phase === "Flying" || phase === "Landing";

export interface DroneState {
  phase: DronePhase;
  telemetry: Telemetry | null;
}

/**
 * Authoritative phase and telemetry snapshot of one drone. Nothing else
 * writes either; every change comes back as a StateChange for the hub.
 */
export class DroneStateMachine {
  private current: DronePhase = "Idle";
  private snapshot: Telemetry | null = null;

  constructor(public readonly droneId: string) {}

  get phase() {
    return this.current;
  }

  get telemetry(): Readonly<Telemetry> | null {
    return this.snapshot;
  }

  state(): DroneState {
    return {
      phase: this.current,
      telemetry: this.snapshot ? { ...this.snapshot } : null,
    };
  }

  /** Applies an acknowledged command. */
  applyAcknowledged(kind: CommandKind, commandId: number): StateChange | null {
    const target = nextPhase(this.current, kind);
    if (target === null) {
      throw new GatewayError(
        "IllegalTransition",
        `${kind} is not allowed while ${this.current}`
      );
    }
    return this.transition(target, "command", commandId);
  }

  /**
   * Merges a telemetry frame into the snapshot. A landing drone reporting
   * an altitude within `landedAltitude` of the ground becomes Idle.
   */
  applyTelemetry(telemetry: Telemetry, landedAltitude: number) {
    this.snapshot = { ...this.snapshot, ...telemetry };

    const altitude = telemetry.altitude;
    if (
      this.current === "Landing" &&
      typeof altitude === "number" &&
      Math.abs(altitude) <= landedAltitude
    ) {
      return this.transition("Idle", "telemetry");
    }
    return null;
  }

  /** A drone lost while airborne is faulted; grounded drones are left as is. */
  forceFault(cause: "timeout" | "disconnect") {
    if (!isAirborne(this.current)) return null;
    return this.transition("Fault", cause);
  }

  private transition(
    to: DronePhase,
    cause: TransitionCause,
    commandId?: number
  ): StateChange | null {
    const from = this.current;
    if (from === to) return null;

    this.current = to;
    const change: StateChange = {
      droneId: this.droneId,
      previousState: from,
      newState: to,
      cause,
    };
    if (commandId !== undefined) change.commandId = commandId;
    return change;
  }
}
