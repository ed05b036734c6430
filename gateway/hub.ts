import type { GatewayEvent } from "../shared/types.ts";
import { GatewayError } from "./errors.ts";
import { log } from "./log.ts";
import type { SessionRegistry } from "./registry.ts";

interface Outbox {
  events: GatewayEvent[];
  dropped: number;
  /** Set on the first drop, cleared once the backlog drains. */
  overflowing: boolean;
}

export interface HubOptions {
  bufferCapacity: number;
  flushIntervalMs: number;
}

export interface HubStats {
  subscribers: number;
  buffered: number;
  dropped: number;
}

/**
 * Fans drone events out to subscribed operators. Every subscriber gets its
 * own FIFO outbox, so one stalled connection only ever loses its own
 * oldest events.
 */
export class BroadcastHub {
  private subscribers: Map<string, Set<string>> = new Map();
  private outboxes: Map<string, Outbox> = new Map();
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private droppedTotal = 0;

  constructor(private registry: SessionRegistry, private options: HubOptions) {}

  subscribe(operatorId: string, droneId: string) {
    const operator = this.registry.lookupOperator(operatorId);

    let set = this.subscribers.get(droneId);
    if (!set) {
      set = new Set();
      this.subscribers.set(droneId, set);
    }
    set.add(operatorId);
    operator.subscriptions.add(droneId);

    if (!this.outboxes.has(operatorId)) {
      this.outboxes.set(operatorId, { events: [], dropped: 0, overflowing: false });
    }
    log.debug("Subscribed", { drone: droneId, operator: operatorId });
  }

  unsubscribe(operatorId: string, droneId: string) {
    const set = this.subscribers.get(droneId);
    if (!set?.delete(operatorId)) return false;
    if (set.size === 0) this.subscribers.delete(droneId);

    const operator = this.registry.find(operatorId);
    if (operator?.kind === "operator") operator.subscriptions.delete(droneId);
    return true;
  }

  /** Forgets an operator entirely, including anything still buffered. */
  removeSubscriber(operatorId: string, droneIds?: Iterable<string>) {
    const ids = droneIds ?? Array.from(this.subscribers.keys());
    for (const droneId of ids) {
      const set = this.subscribers.get(droneId);
      set?.delete(operatorId);
      if (set?.size === 0) this.subscribers.delete(droneId);
    }
    this.outboxes.delete(operatorId);
  }

  subscribersOf(droneId: string) {
    return Array.from(this.subscribers.get(droneId) ?? []);
  }

  /** Queues the event for every subscriber of the drone and flushes. */
  publish(droneId: string, event: GatewayEvent) {
    const set = this.subscribers.get(droneId);
    if (!set) return 0;

    set.forEach((operatorId) => {
      const outbox = this.outboxes.get(operatorId);
      if (!outbox) return;

      outbox.events.push(event);
      while (outbox.events.length > this.options.bufferCapacity) {
        outbox.events.shift();
        outbox.dropped++;
        this.droppedTotal++;
        if (!outbox.overflowing) {
          outbox.overflowing = true;
          const overflow = new GatewayError(
            "BufferOverflow",
            `Outbox of "${operatorId}" is full, dropping oldest events`
          );
          log.warn(overflow.message, { drone: droneId, code: overflow.code });
        }
      }
      this.flushOne(operatorId, outbox);
    });
    return set.size;
  }

  flush() {
    this.outboxes.forEach((outbox, operatorId) => {
      if (outbox.events.length > 0) this.flushOne(operatorId, outbox);
    });
  }

  dropped(operatorId: string) {
    return this.outboxes.get(operatorId)?.dropped ?? 0;
  }

  buffered(operatorId: string) {
    return this.outboxes.get(operatorId)?.events.length ?? 0;
  }

  stats(): HubStats {
    let buffered = 0;
    this.outboxes.forEach((outbox) => (buffered += outbox.events.length));
    return { subscribers: this.outboxes.size, buffered, dropped: this.droppedTotal };
  }

  start() {
    if (this.flushTimer) return;
    this.flushTimer = setInterval(() => this.flush(), this.options.flushIntervalMs);
  }

  stop() {
    if (this.flushTimer) clearInterval(this.flushTimer);
    this.flushTimer = null;
  }

  private flushOne(operatorId: string, outbox: Outbox) {
    while (outbox.events.length > 0 && this.registry.isWritable(operatorId)) {
      const [event] = outbox.events;
      if (!this.registry.send(operatorId, event)) break;
      outbox.events.shift();
    }
    if (outbox.events.length === 0) outbox.overflowing = false;
  }
}
