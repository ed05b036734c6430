import type { CommandStatus, DroneStatus } from "../shared/types.ts";
import type { CommandRequest } from "./commands.ts";
import type { GatewayConfig } from "./config.ts";
import { CommandDispatcher } from "./dispatcher.ts";
import type { CommandResult, DroneReply } from "./dispatcher.ts";
import { describeError, isGatewayError } from "./errors.ts";
import { BroadcastHub } from "./hub.ts";
import { log } from "./log.ts";
import { SessionRegistry } from "./registry.ts";
import type { Connection, DroneSession, Session } from "./registry.ts";
import { TelemetryRouter } from "./telemetry.ts";
import { CommandValidator } from "./validator.ts";
import type { RejectionReason } from "./validator.ts";

export type SubmitOutcome =
  | { accepted: true; commandId: number; completion: Promise<CommandResult> }
  | {
      accepted: false;
      reason: RejectionReason | "DroneUnreachable";
      message: string;
    };

export interface GatewayHealth {
  status: "running";
  uptimeSeconds: number;
  drones: number;
  operators: number;
  bufferedEvents: number;
  droppedEvents: number;
  lastUpdate: string;
}

export interface TelemetryInput {
  seq: number;
  payload?: unknown;
  timestamp?: number;
}

const toStatus = (result: CommandResult): CommandStatus => {
  const { command } = result;
  const base = { droneId: command.droneId, kind: command.kind, commandId: command.id };
  switch (result.status) {
    case "acked":
      return { ...base, status: "acked" };
    case "failed":
      return { ...base, status: "failed", reason: result.error.code, message: result.error.message };
  }
};

/**
 * Entry point of the core. Transports call these methods; nothing here
 * knows about sockets or serialization.
 */
export class GatewayManager {
  public readonly registry: SessionRegistry;
  public readonly hub: BroadcastHub;
  public readonly validator: CommandValidator;
  public readonly dispatcher: CommandDispatcher;
  public readonly router: TelemetryRouter;
  private startedAt = Date.now();

  constructor(config: GatewayConfig) {
    this.registry = new SessionRegistry({
      livenessTimeoutMs: config.livenessTimeoutMs,
      sweepIntervalMs: config.sweepIntervalMs,
    });
    this.hub = new BroadcastHub(this.registry, {
      bufferCapacity: config.subscriberBufferCapacity,
      flushIntervalMs: config.flushIntervalMs,
    });
    this.validator = new CommandValidator({ strictOrdering: config.strictOrdering });
    this.dispatcher = new CommandDispatcher(this.registry, this.hub, {
      ackTimeoutMs: config.commandAckTimeoutMs,
    });
    this.router = new TelemetryRouter(this.registry, this.hub, {
      landedAltitude: config.landedAltitude,
    });

    this.registry.evictEvt.attach(({ session, cause }) => {
      this.retire(session, cause).catch((error) =>
        log.error("Failed to clean up evicted session", {
          session: session.id,
          error: describeError(error),
        })
      );
    });
  }

  start() {
    this.startedAt = Date.now();
    this.registry.start();
    this.hub.start();
  }

  stop() {
    this.registry.stop();
    this.hub.stop();
  }

  connectDrone(droneId: string, connection: Connection) {
    const session = this.registry.registerDrone(droneId, connection);
    connection.send({ type: "id", payload: droneId });
    return session;
  }

  connectOperator(operatorId: string, connection: Connection) {
    const session = this.registry.registerOperator(operatorId, connection);
    connection.send({ type: "id", payload: operatorId });
    return session;
  }

  /** Idempotent. With `connection`, only tears down the session it owns. */
  async disconnect(id: string, connection?: Connection) {
    const session = this.registry.unregister(id, connection);
    if (!session) return false;
    await this.retire(session, "disconnect");
    return true;
  }

  heartbeat(id: string, now = Date.now()) {
    this.registry.heartbeat(id, now);
  }

  async ingestTelemetry(droneId: string, input: TelemetryInput, now = Date.now()) {
    return this.router.ingest(
      { droneId, seq: input.seq, payload: input.payload, sentAt: input.timestamp },
      now
    );
  }

  handleReply(droneId: string, reply: DroneReply) {
    this.registry.heartbeat(droneId);
    return this.dispatcher.ack(droneId, reply);
  }

  /**
   * Validates and queues a command. Rejections come back synchronously;
   * the drone's answer is reported through `completion` and, when the
   * operator is still connected, as a command-status message.
   */
  async submitCommand(operatorId: string, request: CommandRequest): Promise<SubmitOutcome> {
    this.registry.lookupOperator(operatorId);
    const session = this.registry.findDrone(request.droneId);

    const outcome = session
      ? await session.lock.runExclusive(() => this.submitLocked(session, operatorId, request))
      : this.rejectUnknown(request);

    if (!outcome.accepted) {
      this.registry.send(operatorId, {
        type: "command-status",
        payload: {
          droneId: request.droneId,
          kind: request.kind,
          status: "rejected",
          reason: outcome.reason,
          message: outcome.message,
        },
      });
      return outcome;
    }

    outcome.completion
      .then((result) => {
        this.registry.send(operatorId, { type: "command-status", payload: toStatus(result) });
      })
      .catch((error) =>
        log.error("Failed to report command result", {
          drone: request.droneId,
          error: describeError(error),
        })
      );
    return outcome;
  }

  subscribe(operatorId: string, droneId: string) {
    this.hub.subscribe(operatorId, droneId);
    const drone = this.registry.findDrone(droneId);
    return drone ? this.statusOf(drone) : null;
  }

  unsubscribe(operatorId: string, droneId: string) {
    return this.hub.unsubscribe(operatorId, droneId);
  }

  getStatus(droneId: string): DroneStatus {
    return this.statusOf(this.registry.lookupDrone(droneId));
  }

  listStatus(): DroneStatus[] {
    return this.registry.drones().map((session) => this.statusOf(session));
  }

  health(now = Date.now()): GatewayHealth {
    const stats = this.hub.stats();
    return {
      status: "running",
      uptimeSeconds: Math.round((now - this.startedAt) / 100) / 10,
      drones: this.registry.drones().length,
      operators: this.registry.operators().length,
      bufferedEvents: stats.buffered,
      droppedEvents: stats.dropped,
      lastUpdate: new Date(now).toISOString(),
    };
  }

  private submitLocked(
    session: DroneSession,
    operatorId: string,
    request: CommandRequest
  ): SubmitOutcome {
    if (!this.registry.isCurrent(session)) return this.rejectUnknown(request);

    const verdict = this.validator.validate(request, this.dispatcher.validationContext(session));
    if (!verdict.ok) {
      log.info(`rejected command "${request.kind}": ${verdict.reason}`, { drone: session.id });
      return { accepted: false, reason: verdict.reason, message: verdict.message };
    }

    try {
      const { command, completion } = this.dispatcher.submit(
        session,
        operatorId,
        verdict.kind,
        verdict.payload
      );
      this.registry.send(operatorId, {
        type: "command-status",
        payload: { droneId: session.id, kind: command.kind, commandId: command.id, status: "accepted" },
      });
      return { accepted: true, commandId: command.id, completion };
    } catch (error) {
      if (isGatewayError(error) && error.code === "DroneUnreachable") {
        return { accepted: false, reason: error.code, message: error.message };
      }
      throw error;
    }
  }

  private rejectUnknown(request: CommandRequest): SubmitOutcome {
    const { reason, message } = this.validator.validate(request, null);
    return { accepted: false, reason, message };
  }

  /** Cleanup after a session left, whether by disconnect or eviction. */
  private async retire(session: Session, cause: "timeout" | "disconnect") {
    if (session.kind === "operator") {
      this.hub.removeSubscriber(session.id, session.subscriptions);
      session.subscriptions.clear();
      return;
    }

    await session.lock.runExclusive(() => {
      this.dispatcher.cancelAll(session);
      const change = session.state.forceFault(cause);
      if (change) {
        log.warn(`${change.previousState} -> Fault, drone lost`, { drone: session.id, cause });
        this.hub.publish(session.id, { type: "state", payload: change });
      }
      this.hub.publish(session.id, { type: "offline", payload: { droneId: session.id, reason: cause } });
    });
  }

  private statusOf(session: DroneSession): DroneStatus {
    const { phase, telemetry } = session.state.state();
    return {
      droneId: session.id,
      phase,
      telemetry,
      lastSeen: session.lastSeen,
      lastSeq: session.lastSeq,
      pendingCommands: session.commands.size,
    };
  }
}
