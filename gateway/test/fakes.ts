import type { GatewayEvent, OutboundMessage } from "../../shared/types.ts";
import { defaultConfig } from "../config.ts";
import type { GatewayConfig } from "../config.ts";
import type { Connection } from "../registry.ts";

/** In-memory endpoint that records everything sent to it. */
export class FakeConnection implements Connection {
  sent: OutboundMessage[] = [];
  isClosed = false;
  isWritable = true;
  failSends = false;
  closeCode: number | undefined;

  send(message: OutboundMessage) {
    if (this.failSends) throw new Error("socket write failed");
    this.sent.push(message);
  }

  close(code?: number) {
    this.isClosed = true;
    this.closeCode = code;
  }

  ofType<T extends OutboundMessage["type"]>(type: T) {
    return this.sent.filter(
      (message): message is Extract<OutboundMessage, { type: T }> => message.type === type
    );
  }

  /** Kinds of the commands delivered to a drone, in order. */
  deliveries() {
    return this.ofType("command").map((message) => message.payload.kind);
  }
}

export const testConfig = (overrides: Partial<GatewayConfig> = {}): GatewayConfig => ({
  ...defaultConfig,
  commandAckTimeoutMs: 200,
  livenessTimeoutMs: 1000,
  ...overrides,
});

export const telemetryEvent = (droneId: string, seq: number): GatewayEvent => ({
  type: "telemetry",
  payload: { droneId, seq, telemetry: { altitude: seq }, timestamp: seq },
});

/** Runs `fn` and returns what it threw. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
