import { z } from "zod";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8891),
  LIVENESS_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  COMMAND_ACK_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  SUBSCRIBER_BUFFER_CAPACITY: z.coerce.number().int().positive().default(256),
  FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(100),
  LANDED_ALTITUDE_M: z.coerce.number().nonnegative().default(0.1),
  STRICT_COMMAND_ORDERING: flag.default("true"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export interface GatewayConfig {
  port: number;
  /** Silence after which a session is evicted. */
  livenessTimeoutMs: number;
  sweepIntervalMs: number;
  commandAckTimeoutMs: number;
  subscriberBufferCapacity: number;
  flushIntervalMs: number;
  /** Altitude (m) at or below which a landing drone counts as down. */
  landedAltitude: number;
  strictOrdering: boolean;
  logLevel: "error" | "warn" | "info" | "debug";
}

export const defaultConfig: GatewayConfig = loadConfig({});

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): GatewayConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid gateway configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    livenessTimeoutMs: parsed.LIVENESS_TIMEOUT_MS,
    sweepIntervalMs: parsed.SWEEP_INTERVAL_MS,
    commandAckTimeoutMs: parsed.COMMAND_ACK_TIMEOUT_MS,
    subscriberBufferCapacity: parsed.SUBSCRIBER_BUFFER_CAPACITY,
    flushIntervalMs: parsed.FLUSH_INTERVAL_MS,
    landedAltitude: parsed.LANDED_ALTITUDE_M,
    strictOrdering: parsed.STRICT_COMMAND_ORDERING,
    logLevel: parsed.LOG_LEVEL,
  };
}
