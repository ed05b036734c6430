export const dronePhases = [
  "Idle",
  "Armed",
  "Flying",
  "Landing",
  "Fault",
] as const;

export type DronePhase = (typeof dronePhases)[number];

export const commandKinds = [
  "Arm",
  "Disarm",
  "Takeoff",
  "Land",
  "Move",
  "EmergencyStop",
] as const;

export type CommandKind = (typeof commandKinds)[number];

/** Opaque numeric sensor fields, passed through as reported. */
export interface Telemetry {
  [field: string]: number;
}

export interface MovePayload {
  x: number;
  y: number;
  z: number;
  /** cm/s */
  speed?: number;
}

export interface TakeoffPayload {
  /** metres */
  altitude?: number;
}

export type CommandPayload = MovePayload | TakeoffPayload | Record<string, never>;

export type TransitionCause = "command" | "telemetry" | "timeout" | "disconnect";

export type ReplyOutcome = "Ack" | "Nack";

export interface TelemetryUpdate {
  droneId: string;
  seq: number;
  telemetry: Telemetry;
  /** Gateway receipt time. */
  timestamp: number;
  /** Drone clock, when the drone reports one. */
  sentAt?: number;
}

export interface StateChange {
  droneId: string;
  previousState: DronePhase;
  newState: DronePhase;
  cause: TransitionCause;
  commandId?: number;
}

export interface DroneStatus {
  droneId: string;
  phase: DronePhase;
  telemetry: Telemetry | null;
  lastSeen: number;
  lastSeq: number | null;
  pendingCommands: number;
}

export interface CommandDelivery {
  commandId: number;
  kind: CommandKind;
  payload: CommandPayload;
}

export type CommandStatus =
  | { droneId: string; kind: string; status: "rejected"; reason: string; message: string }
  | { droneId: string; kind: CommandKind; commandId: number; status: "accepted" }
  | { droneId: string; kind: CommandKind; commandId: number; status: "acked" }
  | { droneId: string; kind: CommandKind; commandId: number; status: "failed"; reason: string; message: string };

// gateway -> operators, through the broadcast hub
type EventTelemetry = { type: "telemetry"; payload: TelemetryUpdate };
type EventState = { type: "state"; payload: StateChange };
type EventOffline = {
  type: "offline";
  payload: { droneId: string; reason: TransitionCause };
};

export type GatewayEvent = EventTelemetry | EventState | EventOffline;

// gateway -> any connection
type PayloadId = { type: "id"; payload: string };
type PayloadError = { type: "error"; payload: { code: string; message: string } };
type PayloadCommandStatus = { type: "command-status"; payload: CommandStatus };
type PayloadStatus = { type: "status"; payload: { drones: DroneStatus[] } };
type PayloadCommand = { type: "command"; payload: CommandDelivery };

export type OperatorPayload =
  | GatewayEvent
  | PayloadId
  | PayloadError
  | PayloadCommandStatus
  | PayloadStatus;

export type DronePayload = PayloadId | PayloadError | PayloadCommand;

export type OutboundMessage = OperatorPayload | DronePayload;

// operators -> gateway
type RequestSubscribe = { type: "subscribe"; payload: { droneId: string } };
type RequestUnsubscribe = { type: "unsubscribe"; payload: { droneId: string } };
type RequestCommand = {
  type: "command";
  payload: { droneId: string; kind: string; payload?: unknown; id?: number };
};
type RequestStatus = { type: "status"; payload: { droneId?: string } };

export type OperatorMessage =
  | RequestSubscribe
  | RequestUnsubscribe
  | RequestCommand
  | RequestStatus;

// drones -> gateway
type ReportTelemetry = {
  type: "telemetry";
  payload: { seq: number; payload?: unknown; timestamp?: number };
};
type ReportReply = {
  type: "reply";
  payload: { commandId: number; outcome: ReplyOutcome; reason?: string };
};
type ReportHeartbeat = { type: "heartbeat"; payload?: unknown };

export type DroneMessage = ReportTelemetry | ReportReply | ReportHeartbeat;
