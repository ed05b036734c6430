import type { CommandKind, CommandPayload, DronePhase } from "../shared/types.ts";
import { commandKindSchema, isEmergencyStop, payloadSchemas } from "./commands.ts";
import type { CommandRequest } from "./commands.ts";
import { isCommandAllowed } from "./statemachine.ts";

export type RejectionReason =
  | "UnknownDrone"
  | "IllegalTransition"
  | "StaleCommand"
  | "MalformedPayload";

export interface ValidationContext {
  /** Phase the drone ends up in once everything already queued is acked. */
  phase: DronePhase;
  lastCommandId: number;
}

export type Rejection = { ok: false; reason: RejectionReason; message: string };

export type Validation =
  | { ok: true; kind: CommandKind; payload: CommandPayload }
  | Rejection;

export interface ValidatorOptions {
  /** Reject caller-supplied ids that skip or repeat a position. */
  strictOrdering: boolean;
}

const reject = (reason: RejectionReason, message: string): Rejection => ({
  ok: false,
  reason,
  message,
});

export class CommandValidator {
  constructor(private options: ValidatorOptions) {}

  validate(request: CommandRequest, context: null): Rejection;
  validate(request: CommandRequest, context: ValidationContext | null): Validation;
  validate(request: CommandRequest, context: ValidationContext | null): Validation {
    if (!context) {
      return reject("UnknownDrone", `Drone "${request.droneId}" is not connected`);
    }

    const kind = commandKindSchema.safeParse(request.kind);
    if (!kind.success) {
      return reject("MalformedPayload", `Unknown command kind "${request.kind}"`);
    }

    // A stop is never held back by its payload, phase or backlog.
    if (isEmergencyStop(kind.data)) {
      return { ok: true, kind: kind.data, payload: {} };
    }

    const payload = payloadSchemas[kind.data].safeParse(request.payload ?? {});
    if (!payload.success) {
      const issue = payload.error.issues[0];
      const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return reject("MalformedPayload", `Invalid ${kind.data} payload, ${where}${issue.message}`);
    }

    if (!isCommandAllowed(context.phase, kind.data)) {
      return reject("IllegalTransition", `${kind.data} is not allowed while ${context.phase}`);
    }

    const expected = context.lastCommandId + 1;
    if (this.options.strictOrdering && request.id !== undefined && request.id !== expected) {
      return reject("StaleCommand", `Command id ${request.id} is out of order, expected ${expected}`);
    }

    return { ok: true, kind: kind.data, payload: payload.data };
  }
}
