import { beforeEach, describe, expect, it } from "vitest";
import { BroadcastHub } from "./hub.ts";
import { SessionRegistry } from "./registry.ts";
import type { DroneSession } from "./registry.ts";
import { decodeTelemetry, TelemetryRouter } from "./telemetry.ts";
import { FakeConnection, thrown } from "./test/fakes.ts";

describe("decodeTelemetry", () => {
  it("passes numeric objects through", () => {
    expect(decodeTelemetry({ altitude: 12.5, battery: 80 })).toEqual({ altitude: 12.5, battery: 80 });
  });

  it("rejects non-numeric fields", () => {
    expect(thrown(() => decodeTelemetry({ altitude: "high" }))).toMatchObject({
      code: "MalformedPayload",
      message: 'Telemetry field "altitude" is not a number',
    });
  });

  it("reads key:value state lines", () => {
    expect(decodeTelemetry("mid:-1;x:0;h:120;bat:87;\r\n")).toEqual({
      mid: -1,
      x: 0,
      h: 120,
      bat: 87,
      altitude: 1.2,
      battery: 87,
    });
  });

  it("reads STM32 sensor lines", () => {
    expect(decodeTelemetry("<SENSOR_DATA|MPU|0.1|0.2|9.8|1|2|3|BMP|1013.2|21.5|120.4>")).toEqual({
      accel_x: 0.1,
      accel_y: 0.2,
      accel_z: 9.8,
      gyro_x: 1,
      gyro_y: 2,
      gyro_z: 3,
      pressure: 1013.2,
      temperature: 21.5,
      altitude: 120.4,
    });
  });

  it("defaults a missing sensor altitude to zero", () => {
    expect(decodeTelemetry("<SENSOR_DATA|MPU|0|0|0|0|0|0|BMP|1000|20>").altitude).toBe(0);
  });

  it("rejects other layouts", () => {
    expect(thrown(() => decodeTelemetry("<SENSOR_DATA|GPS|1|2>"))).toMatchObject({
      code: "MalformedPayload",
    });
    expect(thrown(() => decodeTelemetry("<SENSOR_DATA|MPU|a|0|0|0|0|0|BMP|1000|20>"))).toMatchObject({
      code: "MalformedPayload",
    });
    expect(thrown(() => decodeTelemetry(42))).toMatchObject({ code: "MalformedPayload" });
    expect(thrown(() => decodeTelemetry([1, 2]))).toMatchObject({ code: "MalformedPayload" });
  });
});

describe("TelemetryRouter", () => {
  let registry: SessionRegistry;
  let router: TelemetryRouter;
  let operator: FakeConnection;
  let session: DroneSession;

  beforeEach(() => {
    registry = new SessionRegistry({ livenessTimeoutMs: 5000, sweepIntervalMs: 1000 });
    const hub = new BroadcastHub(registry, { bufferCapacity: 10, flushIntervalMs: 100 });
    router = new TelemetryRouter(registry, hub, { landedAltitude: 0.1 });

    session = registry.registerDrone("d1", new FakeConnection(), 0);
    operator = new FakeConnection();
    registry.registerOperator("o1", operator);
    hub.subscribe("o1", "d1");
  });

  const frame = (seq: number, payload: unknown) => ({ droneId: "d1", seq, payload });

  it("applies a frame and republishes it", async () => {
    expect(await router.ingest(frame(1, { battery: 90 }), 500)).toBe(true);

    expect(operator.sent).toEqual([
      {
        type: "telemetry",
        payload: { droneId: "d1", seq: 1, telemetry: { battery: 90 }, timestamp: 500 },
      },
    ]);
    expect(session.lastSeq).toBe(1);
    expect(session.state.telemetry).toEqual({ battery: 90 });
  });

  it("discards repeated and out-of-order frames", async () => {
    expect(await router.ingest(frame(5, { battery: 90 }), 500)).toBe(true);
    expect(await router.ingest(frame(5, { battery: 80 }), 500)).toBe(false);
    expect(await router.ingest(frame(3, { battery: 70 }), 500)).toBe(false);

    expect(operator.ofType("telemetry")).toHaveLength(1);
    expect(session.state.telemetry).toEqual({ battery: 90 });
    expect(session.lastSeq).toBe(5);
  });

  it("applies frames in sequence order when they arrive together", async () => {
    const results = await Promise.all([
      router.ingest(frame(1, { altitude: 1 }), 500),
      router.ingest(frame(2, { altitude: 2 }), 500),
      router.ingest(frame(2, { altitude: 9 }), 500),
    ]);
    expect(results).toEqual([true, true, false]);
    expect(session.state.telemetry).toEqual({ altitude: 2 });
  });

  it("counts telemetry as a heartbeat", async () => {
    await router.ingest(frame(1, { battery: 90 }), 4200);
    expect(session.lastSeen).toBe(4200);
  });

  it("keeps liveness on the gateway clock whatever the drone reports", async () => {
    await router.ingest({ ...frame(1, { battery: 90 }), sentAt: 3_600_000 }, 700);

    expect(session.lastSeen).toBe(700);
    expect(operator.ofType("telemetry")[0].payload).toEqual({
      droneId: "d1",
      seq: 1,
      telemetry: { battery: 90 },
      timestamp: 700,
      sentAt: 3_600_000,
    });
    expect(registry.sweep(700 + 6000).map((evicted) => evicted.id)).toEqual(["d1"]);
  });

  it("discards a repeated frame before decoding it", async () => {
    expect(await router.ingest(frame(1, { battery: 90 }), 500)).toBe(true);
    expect(await router.ingest(frame(1, "garbled"), 500)).toBe(false);
    await expect(router.ingest(frame(2, "garbled"), 500)).rejects.toMatchObject({
      code: "MalformedPayload",
    });
    expect(session.lastSeq).toBe(1);
  });

  it("publishes the landing transition after the frame", async () => {
    session.state.applyAcknowledged("Arm", 1);
    session.state.applyAcknowledged("Takeoff", 2);
    session.state.applyAcknowledged("Land", 3);

    await router.ingest(frame(1, { altitude: 0.05 }), 500);

    expect(operator.sent.map((message) => message.type)).toEqual(["telemetry", "state"]);
    expect(operator.ofType("state")[0].payload).toEqual({
      droneId: "d1",
      previousState: "Landing",
      newState: "Idle",
      cause: "telemetry",
    });
    expect(session.state.phase).toBe("Idle");
  });

  it("rejects frames from unknown drones", async () => {
    await expect(router.ingest({ ...frame(1, {}), droneId: "ghost" }, 500)).rejects.toMatchObject({
      code: "NotFound",
    });
  });

  it("rejects frames that were waiting when the drone left", async () => {
    const pending = router.ingest(frame(1, { battery: 50 }), 500);
    registry.unregister("d1");
    await expect(pending).rejects.toMatchObject({ code: "NotFound" });
  });
});
