import { Evt } from "evt";
import type {
  CommandKind,
  CommandPayload,
  ReplyOutcome,
  StateChange,
} from "../shared/types.ts";
import { isEmergencyStop } from "./commands.ts";
import type { Command } from "./commands.ts";
import { describeError, GatewayError, isGatewayError } from "./errors.ts";
import type { BroadcastHub } from "./hub.ts";
import { log } from "./log.ts";
import type { DroneSession, SessionRegistry } from "./registry.ts";
import { isCommandAllowed, nextPhase } from "./statemachine.ts";
import type { ValidationContext } from "./validator.ts";

type ReplySignal =
  | { kind: "reply"; outcome: ReplyOutcome; reason?: string }
  | { kind: "failed"; error: GatewayError };

export type CommandResult =
  | { status: "acked"; command: Command; stateChange: StateChange | null }
  | { status: "failed"; command: Command; error: GatewayError };

export interface Submission {
  command: Command;
  /** Resolves once the drone answers or the command is given up on. Never rejects. */
  completion: Promise<CommandResult>;
}

export interface DroneReply {
  commandId: number;
  outcome: ReplyOutcome;
  reason?: string;
}

interface PendingCommand {
  command: Command;
  signal: Evt<ReplySignal>;
  done: boolean;
  finish: (result: CommandResult) => void;
}

/**
 * Per-drone command buffer. Ordinary commands go out one at a time;
 * an emergency stop is moved to the front and may overtake one in flight.
 */
export class CommandQueue {
  private queued: PendingCommand[] = [];
  private inFlight: PendingCommand[] = [];

  get size() {
    return this.queued.length + this.inFlight.length;
  }

  enqueue(entry: PendingCommand) {
    if (isEmergencyStop(entry.command.kind)) {
      const stops = this.queued.findIndex((x) => !isEmergencyStop(x.command.kind));
      this.queued.splice(stops === -1 ? this.queued.length : stops, 0, entry);
    } else {
      this.queued.push(entry);
    }
  }

  /** In-flight commands first, then queued ones, in delivery order. */
  commands(): Command[] {
    return [...this.inFlight, ...this.queued].map((entry) => entry.command);
  }

  /** The next command allowed on the wire, if any. */
  next(): PendingCommand | null {
    const head = this.queued[0];
    if (!head) return null;
    if (isEmergencyStop(head.command.kind)) return head;
    return this.inFlight.length === 0 ? head : null;
  }

  markDelivered(entry: PendingCommand) {
    this.queued = this.queued.filter((x) => x !== entry);
    this.inFlight.push(entry);
  }

  findInFlight(commandId: number) {
    return this.inFlight.find((entry) => entry.command.id === commandId) ?? null;
  }

  remove(entry: PendingCommand) {
    const before = this.size;
    this.queued = this.queued.filter((x) => x !== entry);
    this.inFlight = this.inFlight.filter((x) => x !== entry);
    return this.size < before;
  }

  drain() {
    const drained = { queued: this.queued, inFlight: this.inFlight };
    this.queued = [];
    return drained;
  }
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export interface DispatcherOptions {
  ackTimeoutMs: number;
}

export class CommandDispatcher {
  constructor(
    private registry: SessionRegistry,
    private hub: BroadcastHub,
    private options: DispatcherOptions
  ) {}

  /** Phase projected through every in-flight and queued command. */
  validationContext(session: DroneSession): ValidationContext {
    let phase = session.state.phase;
    for (const command of session.commands.commands()) {
      phase = nextPhase(phase, command.kind) ?? phase;
    }
    return { phase, lastCommandId: session.lastCommandId };
  }

  /**
   * Queues a validated command. Must run under the drone's lock.
   * Throws DroneUnreachable when the drone's connection is gone.
   */
  submit(
    session: DroneSession,
    operatorId: string,
    kind: CommandKind,
    payload: CommandPayload,
    now = Date.now()
  ): Submission {
    if (!this.registry.isReachable(session.id)) {
      throw new GatewayError("DroneUnreachable", `Drone "${session.id}" is not reachable`);
    }

    const command: Command = {
      id: ++session.lastCommandId,
      droneId: session.id,
      kind,
      payload,
      operatorId,
      issuedAt: now,
    };
    const { promise, resolve } = deferred<CommandResult>();

    log.info(`buffer command "${kind}"`, { drone: session.id, commandId: command.id });
    session.commands.enqueue({
      command,
      signal: Evt.create<ReplySignal>(),
      done: false,
      finish: resolve,
    });
    this.pump(session);

    return { command, completion: promise };
  }

  /** Routes a drone reply to the command waiting for it. */
  ack(droneId: string, reply: DroneReply) {
    const session = this.registry.lookupDrone(droneId);
    const entry = session.commands.findInFlight(reply.commandId);
    if (!entry) {
      log.warn("Reply for a command that is not in flight", {
        drone: droneId,
        commandId: reply.commandId,
      });
      return false;
    }

    log.info(`[ANSWER] "${entry.command.kind}": ${reply.outcome} (${Date.now() - entry.command.issuedAt}ms)`, {
      drone: droneId,
    });
    entry.signal.post({ kind: "reply", outcome: reply.outcome, reason: reply.reason });
    return true;
  }

  /** Fails every command of a drone that went away. */
  cancelAll(session: DroneSession) {
    const { queued, inFlight } = session.commands.drain();
    const error = () =>
      new GatewayError("DroneUnreachable", `Drone "${session.id}" disconnected`);

    if (queued.length + inFlight.length > 0) {
      log.info("Clearing command buffer, drone gone", {
        drone: session.id,
        commands: queued.length + inFlight.length,
      });
    }
    for (const entry of queued) {
      this.complete(entry, { status: "failed", command: entry.command, error: error() });
    }
    for (const entry of inFlight) {
      entry.signal.post({ kind: "failed", error: error() });
    }
    return queued.length + inFlight.length;
  }

  private pump(session: DroneSession) {
    for (let entry = session.commands.next(); entry; entry = session.commands.next()) {
      const { command } = entry;

      if (!isEmergencyStop(command.kind) && !isCommandAllowed(session.state.phase, command.kind)) {
        session.commands.remove(entry);
        this.complete(entry, {
          status: "failed",
          command,
          error: new GatewayError(
            "IllegalTransition",
            `${command.kind} is no longer allowed while ${session.state.phase}`
          ),
        });
        continue;
      }

      session.commands.markDelivered(entry);
      const delivered = this.registry.send(session.id, {
        type: "command",
        payload: { commandId: command.id, kind: command.kind, payload: command.payload },
      });
      if (!delivered) {
        session.commands.remove(entry);
        this.complete(entry, {
          status: "failed",
          command,
          error: new GatewayError("DroneUnreachable", `Could not deliver ${command.kind} to "${session.id}"`),
        });
        continue;
      }

      log.info(`[SENDING] "${command.kind}"`, { drone: session.id, commandId: command.id });
      this.awaitReply(session, entry).catch((error) =>
        log.error("Failed to settle command", {
          drone: session.id,
          commandId: command.id,
          error: describeError(error),
        })
      );
    }
  }

  private async awaitReply(session: DroneSession, entry: PendingCommand) {
    const { command } = entry;
    let signal: ReplySignal;
    try {
      signal = await entry.signal.waitFor(this.options.ackTimeoutMs);
    } catch (error) {
      log.debug("Reply wait ended", { drone: session.id, error: describeError(error) });
      signal = {
        kind: "failed",
        error: new GatewayError(
          "CommandTimedOut",
          `No reply to ${command.kind} #${command.id} within ${this.options.ackTimeoutMs}ms`
        ),
      };
    }
    await session.lock.runExclusive(() => this.settle(session, entry, signal));
  }

  private settle(session: DroneSession, entry: PendingCommand, signal: ReplySignal) {
    const { command } = entry;
    session.commands.remove(entry);

    if (signal.kind === "failed") {
      log.info(`send "${command.kind}": ${signal.error.code}`, { drone: session.id, commandId: command.id });
      this.complete(entry, { status: "failed", command, error: signal.error });
    } else if (signal.outcome === "Nack") {
      log.info("command responded with error", {
        drone: session.id,
        command: command.kind,
        reason: signal.reason,
      });
      const error = new GatewayError(
        "CommandTimedOut",
        `Drone refused ${command.kind} #${command.id}: ${signal.reason ?? "no reason given"}`
      );
      this.complete(entry, { status: "failed", command, error });
    } else {
      let stateChange: StateChange | null = null;
      try {
        stateChange = session.state.applyAcknowledged(command.kind, command.id);
      } catch (error) {
        if (!isGatewayError(error)) throw error;
        log.warn("Acknowledged command no longer applies", {
          drone: session.id,
          commandId: command.id,
          error: error.message,
        });
      }
      if (stateChange) this.hub.publish(session.id, { type: "state", payload: stateChange });
      this.complete(entry, { status: "acked", command, stateChange });
    }

    if (this.registry.isCurrent(session)) this.pump(session);
  }

  private complete(entry: PendingCommand, result: CommandResult) {
    if (entry.done) return;
    entry.done = true;
    entry.finish(result);
  }
}
