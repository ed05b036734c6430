import type { Telemetry, TelemetryUpdate } from "../shared/types.ts";
import { GatewayError } from "./errors.ts";
import type { BroadcastHub } from "./hub.ts";
import { log } from "./log.ts";
import type { SessionRegistry } from "./registry.ts";

export interface TelemetryFrame {
  droneId: string;
  /** Drone-assigned, strictly increasing. */
  seq: number;
  /** Raw payload as reported, decoded once the frame is known to be new. */
  payload: unknown;
  /** The drone's own clock. Never used for liveness. */
  sentAt?: number;
}

const sensorFields = [
  "accel_x",
  "accel_y",
  "accel_z",
  "gyro_x",
  "gyro_y",
  "gyro_z",
] as const;

/** `pitch:0;roll:0;yaw:0;h:120;bat:87;` as streamed by the flight controller. */
function decodeStateLine(line: string): Telemetry {
  const telemetry = line
    .trim()
    .split(";")
    .reduce<Telemetry>((memo, pair) => {
      const [key, val] = pair.split(":");
      if (!key) return memo;
      const value = parseFloat(val);
      if (!Number.isFinite(value)) {
        throw new GatewayError("MalformedPayload", `Telemetry field "${key}" is not a number`);
      }
      memo[key.trim()] = value;
      return memo;
    }, {});

  // h is reported in cm
  if ("h" in telemetry) telemetry.altitude = telemetry.h / 100;
  if ("bat" in telemetry) telemetry.battery = telemetry.bat;
  return telemetry;
}

/** `<SENSOR_DATA|MPU|ax|ay|az|gx|gy|gz|BMP|pressure|temperature|altitude>` */
function decodeSensorLine(line: string): Telemetry {
  const parts = line.slice(1, -1).split("|");
  if (parts.length < 11 || parts[0] !== "SENSOR_DATA" || parts[1] !== "MPU" || parts[8] !== "BMP") {
    throw new GatewayError("MalformedPayload", "Unrecognized sensor data layout");
  }

  const numbers = [...parts.slice(2, 8), ...parts.slice(9)].map(Number);
  if (numbers.some((value) => !Number.isFinite(value))) {
    throw new GatewayError("MalformedPayload", "Sensor data contains a non-numeric field");
  }

  const telemetry: Telemetry = {};
  sensorFields.forEach((field, i) => (telemetry[field] = numbers[i]));
  telemetry.pressure = numbers[6];
  telemetry.temperature = numbers[7];
  telemetry.altitude = numbers.length > 8 ? numbers[8] : 0;
  return telemetry;
}

/** Normalizes whatever a drone reports into a flat numeric snapshot. */
export function decodeTelemetry(payload: unknown): Telemetry {
  if (typeof payload === "string") {
    const line = payload.trim();
    if (line.startsWith("<SENSOR_DATA|") && line.endsWith(">")) {
      return decodeSensorLine(line);
    }
    if (line.includes(":")) return decodeStateLine(line);
    throw new GatewayError("MalformedPayload", "Unrecognized telemetry line");
  }

  if (typeof payload === "object" && payload !== null && !Array.isArray(payload)) {
    const telemetry: Telemetry = {};
    for (const [key, value] of Object.entries(payload)) {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new GatewayError("MalformedPayload", `Telemetry field "${key}" is not a number`);
      }
      telemetry[key] = value;
    }
    return telemetry;
  }

  throw new GatewayError("MalformedPayload", "Telemetry payload must be an object or a text line");
}

export interface RouterOptions {
  landedAltitude: number;
}

export class TelemetryRouter {
  constructor(
    private registry: SessionRegistry,
    private hub: BroadcastHub,
    private options: RouterOptions
  ) {}

  /**
   * Applies a frame received at `now` (gateway clock) and republishes it.
   * Returns false for frames at or below the last applied sequence, which
   * are dropped undecoded.
   */
  async ingest(frame: TelemetryFrame, now = Date.now()) {
    const session = this.registry.lookupDrone(frame.droneId);

    return session.lock.runExclusive(() => {
      if (!this.registry.isCurrent(session)) {
        throw new GatewayError("NotFound", `No drone session for "${frame.droneId}"`);
      }
      if (session.lastSeq !== null && frame.seq <= session.lastSeq) {
        log.debug("Discarding stale telemetry frame", {
          drone: frame.droneId,
          seq: frame.seq,
          lastSeq: session.lastSeq,
        });
        return false;
      }

      const telemetry = decodeTelemetry(frame.payload);
      session.lastSeq = frame.seq;
      this.registry.heartbeat(frame.droneId, now);
      const change = session.state.applyTelemetry(telemetry, this.options.landedAltitude);

      const update: TelemetryUpdate = { droneId: frame.droneId, seq: frame.seq, telemetry, timestamp: now };
      if (frame.sentAt !== undefined) update.sentAt = frame.sentAt;
      this.hub.publish(frame.droneId, { type: "telemetry", payload: update });
      if (change) {
        log.info(`${change.previousState} -> ${change.newState}`, { drone: frame.droneId, cause: change.cause });
        this.hub.publish(frame.droneId, { type: "state", payload: change });
      }
      return true;
    });
  }
}
