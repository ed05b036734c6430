import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.ts";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 8891,
      livenessTimeoutMs: 5000,
      sweepIntervalMs: 1000,
      commandAckTimeoutMs: 3000,
      subscriberBufferCapacity: 256,
      flushIntervalMs: 100,
      landedAltitude: 0.1,
      strictOrdering: true,
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "9000",
      COMMAND_ACK_TIMEOUT_MS: "1500",
      SUBSCRIBER_BUFFER_CAPACITY: "16",
      STRICT_COMMAND_ORDERING: "false",
      LOG_LEVEL: "debug",
    });
    expect(config).toMatchObject({
      port: 9000,
      commandAckTimeoutMs: 1500,
      subscriberBufferCapacity: 16,
      strictOrdering: false,
      logLevel: "debug",
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ LIVENESS_TIMEOUT_MS: "-5" })).toThrow(
      /^Invalid gateway configuration: LIVENESS_TIMEOUT_MS/
    );
    expect(() => loadConfig({ STRICT_COMMAND_ORDERING: "maybe" })).toThrow(/STRICT_COMMAND_ORDERING/);
  });
});
