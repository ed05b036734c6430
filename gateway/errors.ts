export type GatewayErrorCode =
  | "DuplicateSession"
  | "NotFound"
  | "UnknownDrone"
  | "IllegalTransition"
  | "StaleCommand"
  | "MalformedPayload"
  | "DroneUnreachable"
  | "CommandTimedOut"
  | "BufferOverflow";

export class GatewayError extends Error {
  override name = "GatewayError";

  constructor(public readonly code: GatewayErrorCode, message: string) {
    super(message);
  }
}

export const isGatewayError = (error: unknown): error is GatewayError =>
  error instanceof GatewayError;

export function describeError(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
