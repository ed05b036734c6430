import { beforeEach, describe, expect, it } from "vitest";
import { SessionRegistry } from "./registry.ts";
import type { Eviction } from "./registry.ts";
import { FakeConnection, thrown } from "./test/fakes.ts";

describe("SessionRegistry", () => {
  let registry: SessionRegistry;

  beforeEach(() => {
    registry = new SessionRegistry({ livenessTimeoutMs: 5000, sweepIntervalMs: 1000 });
  });

  it("keeps at most one session per drone id", () => {
    const first = registry.registerDrone("d1", new FakeConnection(), 0);

    expect(thrown(() => registry.registerDrone("d1", new FakeConnection(), 10))).toMatchObject({
      code: "DuplicateSession",
    });
    expect(registry.lookupDrone("d1")).toBe(first);
    expect(registry.size).toBe(1);
  });

  it("shares one namespace between drones and operators", () => {
    registry.registerDrone("d1", new FakeConnection());
    expect(thrown(() => registry.registerOperator("d1", new FakeConnection()))).toMatchObject({
      code: "DuplicateSession",
    });
  });

  it("creates drone sessions Idle with an empty queue", () => {
    const session = registry.registerDrone("d1", new FakeConnection(), 100);
    expect(session.state.phase).toBe("Idle");
    expect(session.commands.size).toBe(0);
    expect(session.lastSeq).toBeNull();
    expect(session.lastSeen).toBe(100);
  });

  it("unregisters idempotently and closes the connection", () => {
    const connection = new FakeConnection();
    const session = registry.registerDrone("d1", connection);

    expect(registry.unregister("d1")).toBe(session);
    expect(connection.isClosed).toBe(true);
    expect(connection.closeCode).toBe(1000);
    expect(registry.unregister("d1")).toBeNull();
    expect(registry.isCurrent(session)).toBe(false);
  });

  it("leaves a session alone when another connection asks to remove it", () => {
    const live = new FakeConnection();
    registry.registerDrone("d1", live);

    expect(registry.unregister("d1", new FakeConnection())).toBeNull();
    expect(registry.findDrone("d1")).not.toBeNull();
    expect(live.isClosed).toBe(false);
  });

  it("throws NotFound for unknown ids", () => {
    expect(thrown(() => registry.lookup("ghost"))).toMatchObject({ code: "NotFound" });
    expect(thrown(() => registry.heartbeat("ghost"))).toMatchObject({ code: "NotFound" });

    registry.registerOperator("o1", new FakeConnection());
    expect(thrown(() => registry.lookupDrone("o1"))).toMatchObject({ code: "NotFound" });
    expect(registry.lookupOperator("o1").kind).toBe("operator");
  });

  it("never moves last-seen backwards", () => {
    const session = registry.registerDrone("d1", new FakeConnection(), 1000);
    registry.heartbeat("d1", 3000);
    registry.heartbeat("d1", 2000);
    expect(session.lastSeen).toBe(3000);
  });

  it("evicts silent sessions on sweep", () => {
    const droneConnection = new FakeConnection();
    registry.registerDrone("d1", droneConnection, 0);
    registry.registerOperator("o1", new FakeConnection(), 0);
    registry.heartbeat("o1", 4000);

    const evictions: Eviction[] = [];
    registry.evictEvt.attach((eviction) => evictions.push(eviction));

    const evicted = registry.sweep(6000);

    expect(evicted.map((session) => session.id)).toEqual(["d1"]);
    expect(evictions).toHaveLength(1);
    expect(evictions[0].session.id).toBe("d1");
    expect(evictions[0].cause).toBe("timeout");
    expect(registry.findDrone("d1")).toBeNull();
    expect(droneConnection.isClosed).toBe(true);
    expect(registry.lookupOperator("o1").id).toBe("o1");
  });

  it("keeps a session silent for exactly the timeout", () => {
    registry.registerDrone("d1", new FakeConnection(), 0);
    expect(registry.sweep(5000)).toEqual([]);
  });

  it("reports a failed send instead of throwing", () => {
    const connection = new FakeConnection();
    registry.registerOperator("o1", connection);

    connection.failSends = true;
    expect(registry.send("o1", { type: "id", payload: "o1" })).toBe(false);

    connection.failSends = false;
    expect(registry.send("o1", { type: "id", payload: "o1" })).toBe(true);
    expect(registry.send("ghost", { type: "id", payload: "ghost" })).toBe(false);
  });

  it("tracks writability of the connection", () => {
    const connection = new FakeConnection();
    registry.registerOperator("o1", connection);
    expect(registry.isWritable("o1")).toBe(true);

    connection.isWritable = false;
    expect(registry.isWritable("o1")).toBe(false);
    expect(registry.isReachable("o1")).toBe(true);

    connection.isClosed = true;
    expect(registry.isReachable("o1")).toBe(false);
  });
});
