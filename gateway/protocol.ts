import { z } from "zod";
import type { DroneMessage, OperatorMessage } from "../shared/types.ts";
import { describeError, GatewayError } from "./errors.ts";

const droneId = z.string().min(1);

export const operatorMessageSchema: z.ZodType<
  OperatorMessage,
  z.ZodTypeDef,
  unknown
> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), payload: z.object({ droneId }) }),
  z.object({ type: z.literal("unsubscribe"), payload: z.object({ droneId }) }),
  z.object({
    type: z.literal("command"),
    payload: z.object({
      droneId,
      kind: z.string(),
      payload: z.unknown(),
      id: z.number().int().positive().optional(),
    }),
  }),
  z.object({
    type: z.literal("status"),
    payload: z.object({ droneId: droneId.optional() }).default({}),
  }),
]);

export const droneMessageSchema: z.ZodType<
  DroneMessage,
  z.ZodTypeDef,
  unknown
> = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("telemetry"),
    payload: z.object({
      seq: z.number().int().nonnegative(),
      payload: z.unknown(),
      timestamp: z.number().optional(),
    }),
  }),
  z.object({
    type: z.literal("reply"),
    payload: z.object({
      commandId: z.number().int().positive(),
      outcome: z.enum(["Ack", "Nack"]),
      reason: z.string().optional(),
    }),
  }),
  z.object({ type: z.literal("heartbeat"), payload: z.unknown() }),
]);

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: string): T {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new GatewayError("MalformedPayload", `Message is not valid JSON, ${describeError(error)}`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new GatewayError("MalformedPayload", `Invalid message, ${where}${issue.message}`);
  }
  return result.data;
}

export const parseOperatorMessage = (raw: string) => decode(operatorMessageSchema, raw);

export const parseDroneMessage = (raw: string) => decode(droneMessageSchema, raw);
