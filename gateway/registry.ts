import { Evt } from "evt";
import type { OutboundMessage } from "../shared/types.ts";
import { describeError, GatewayError } from "./errors.ts";
import { CommandQueue } from "./dispatcher.ts";
import { Mutex } from "./lock.ts";
import { log } from "./log.ts";
import { DroneStateMachine } from "./statemachine.ts";

/** Transport-side handle of one endpoint. Only the registry holds these. */
export interface Connection {
  readonly isClosed: boolean;
  /** False while the transport is backpressured. */
  readonly isWritable: boolean;
  send(message: OutboundMessage): void;
  close(code?: number, reason?: string): void;
}

export interface DroneSession {
  kind: "drone";
  id: string;
  connectedAt: number;
  lastSeen: number;
  state: DroneStateMachine;
  commands: CommandQueue;
  /** Highest telemetry sequence applied so far. */
  lastSeq: number | null;
  lastCommandId: number;
  lock: Mutex;
}

export interface OperatorSession {
  kind: "operator";
  id: string;
  connectedAt: number;
  lastSeen: number;
  /** Drone ids only; resolved through the registry when needed. */
  subscriptions: Set<string>;
}

export type Session = DroneSession | OperatorSession;

export interface Eviction {
  session: Session;
  cause: "timeout";
}

interface Entry {
  session: Session;
  connection: Connection;
}

export interface RegistryOptions {
  livenessTimeoutMs: number;
  sweepIntervalMs: number;
}

export class SessionRegistry {
  private entries: Map<string, Entry> = new Map();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  public evictEvt = Evt.create<Eviction>();

  constructor(private options: RegistryOptions) {}

  registerDrone(id: string, connection: Connection, now = Date.now()) {
    this.assertAvailable(id);
    const session: DroneSession = {
      kind: "drone",
      id,
      connectedAt: now,
      lastSeen: now,
      state: new DroneStateMachine(id),
      commands: new CommandQueue(),
      lastSeq: null,
      lastCommandId: 0,
      lock: new Mutex(),
    };
    this.entries.set(id, { session, connection });
    log.info("Registered drone", { drone: id });
    return session;
  }

  registerOperator(id: string, connection: Connection, now = Date.now()) {
    this.assertAvailable(id);
    const session: OperatorSession = {
      kind: "operator",
      id,
      connectedAt: now,
      lastSeen: now,
      subscriptions: new Set(),
    };
    this.entries.set(id, { session, connection });
    log.info("Registered operator", { operator: id });
    return session;
  }

  /**
   * Removes a session and closes its connection. When `connection` is
   * given the session is only removed if it still owns that connection.
   */
  unregister(id: string, connection?: Connection): Session | null {
    const entry = this.entries.get(id);
    if (!entry) return null;
    if (connection && entry.connection !== connection) return null;

    this.entries.delete(id);
    if (!entry.connection.isClosed) entry.connection.close(1000, "session ended");
    log.info(`Unregistered ${entry.session.kind}`, { session: id });
    return entry.session;
  }

  lookup(id: string): Session {
    const entry = this.entries.get(id);
    if (!entry) throw new GatewayError("NotFound", `No session for "${id}"`);
    return entry.session;
  }

  find(id: string): Session | null {
    return this.entries.get(id)?.session ?? null;
  }

  lookupDrone(id: string): DroneSession {
    const session = this.findDrone(id);
    if (!session) throw new GatewayError("NotFound", `No drone session for "${id}"`);
    return session;
  }

  lookupOperator(id: string): OperatorSession {
    const session = this.entries.get(id)?.session;
    if (session?.kind !== "operator") {
      throw new GatewayError("NotFound", `No operator session for "${id}"`);
    }
    return session;
  }

  findDrone(id: string): DroneSession | null {
    const session = this.entries.get(id)?.session;
    return session?.kind === "drone" ? session : null;
  }

  /** True while `session` is the live session registered under its id. */
  isCurrent(session: Session) {
    return this.entries.get(session.id)?.session === session;
  }

  heartbeat(id: string, now = Date.now()) {
    const session = this.lookup(id);
    session.lastSeen = Math.max(session.lastSeen, now);
  }

  drones(): DroneSession[] {
    const drones: DroneSession[] = [];
    this.entries.forEach(({ session }) => {
      if (session.kind === "drone") drones.push(session);
    });
    return drones;
  }

  operators(): OperatorSession[] {
    const operators: OperatorSession[] = [];
    this.entries.forEach(({ session }) => {
      if (session.kind === "operator") operators.push(session);
    });
    return operators;
  }

  isWritable(id: string) {
    const connection = this.entries.get(id)?.connection;
    return !!connection && !connection.isClosed && connection.isWritable;
  }

  isReachable(id: string) {
    const connection = this.entries.get(id)?.connection;
    return !!connection && !connection.isClosed;
  }

  /** Returns false when the endpoint is gone or the send failed. */
  send(id: string, message: OutboundMessage) {
    const connection = this.entries.get(id)?.connection;
    if (!connection || connection.isClosed) return false;
    try {
      connection.send(message);
      return true;
    } catch (error) {
      log.warn("Failed to send to connection", {
        session: id,
        type: message.type,
        error: describeError(error),
      });
      return false;
    }
  }

  /** Evicts every session silent for longer than the liveness timeout. */
  sweep(now = Date.now()) {
    const evicted: Session[] = [];
    this.entries.forEach(({ session }) => {
      if (now - session.lastSeen > this.options.livenessTimeoutMs) {
        evicted.push(session);
      }
    });

    for (const session of evicted) {
      log.warn(`Evicting ${session.kind}, liveness timeout`, {
        session: session.id,
        silentMs: now - session.lastSeen,
      });
      this.unregister(session.id);
      this.evictEvt.post({ session, cause: "timeout" });
    }
    return evicted;
  }

  start() {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
  }

  stop() {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = null;
  }

  get size() {
    return this.entries.size;
  }

  private assertAvailable(id: string) {
    if (this.entries.has(id)) {
      throw new GatewayError("DuplicateSession", `"${id}" already has an active session`);
    }
  }
}
