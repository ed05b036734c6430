import { z } from "zod";
import { commandKinds } from "../shared/types.ts";
import type { CommandKind, CommandPayload } from "../shared/types.ts";

const noPayload = z.object({}).strict();

export const commandKindSchema = z.enum(commandKinds);

export const payloadSchemas: Record<CommandKind, z.ZodType<CommandPayload>> = {
  /** spin up motors, drone must be Idle */
  Arm: noPayload,
  /** spin down motors, drone must be Armed */
  Disarm: noPayload,
  /** auto takeoff, optionally to a target altitude in metres */
  Takeoff: z
    .object({ altitude: z.number().finite().positive().optional() })
    .strict(),
  /** auto land */
  Land: noPayload,
  /**
   * fly to x y z relative to the current position at speed (cm/s)
   * speed: 0-100
   */
  Move: z
    .object({
      x: z.number().finite(),
      y: z.number().finite(),
      z: z.number().finite(),
      speed: z.number().finite().positive().max(100).optional(),
    })
    .strict(),
  /** stop all motors immediately, valid from any phase */
  EmergencyStop: noPayload,
};

export interface Command {
  id: number;
  droneId: string;
  kind: CommandKind;
  payload: CommandPayload;
  operatorId: string;
  issuedAt: number;
}

/** A command as it arrives from an operator, before validation. */
export interface CommandRequest {
  droneId: string;
  kind: string;
  payload?: unknown;
  /** Optional caller-chosen id, checked against per-drone ordering. */
  id?: number;
}

export const isEmergencyStop = (kind: CommandKind) => kind === "EmergencyStop";
