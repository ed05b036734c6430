import type { IncomingMessage } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import type { OutboundMessage } from "../shared/types.ts";
import { describeError, isGatewayError } from "./errors.ts";
import { log } from "./log.ts";
import type { GatewayManager } from "./manager.ts";
import { parseDroneMessage, parseOperatorMessage } from "./protocol.ts";
import type { Connection } from "./registry.ts";

interface ServerOptions {
  port: number;
  pingIntervalMs: number;
  /** Bytes queued on a socket before it counts as backpressured. */
  highWaterMark?: number;
}

type Role = "drone" | "operator";

const endpointPattern = /^\/(drone|operator)\/([^/?#]+)\/?(?:[?#].*)?$/;

export class WsConnection implements Connection {
  constructor(private ws: WebSocket, private highWaterMark = 1 << 20) {}

  get isClosed() {
    return this.ws.readyState !== WebSocket.OPEN;
  }

  get isWritable() {
    return !this.isClosed && this.ws.bufferedAmount < this.highWaterMark;
  }

  send(message: OutboundMessage) {
    this.ws.send(JSON.stringify(message));
  }

  close(code?: number, reason?: string) {
    this.ws.close(code, reason);
  }
}

function toText(data: RawData) {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function parseEndpoint(url: string | undefined): { role: Role; id: string } | null {
  const match = endpointPattern.exec(url ?? "");
  if (!match) return null;
  try {
    const role: Role = match[1] === "drone" ? "drone" : "operator";
    return { role, id: decodeURIComponent(match[2]) };
  } catch (error) {
    log.info("Rejected endpoint with a bad id", { url, error: describeError(error) });
    return null;
  }
}

/**
 * Drones connect on /drone/<id>, operators on /operator/<id>. Every frame is
 * a `{ type, payload }` JSON message.
 */
export class Server {
  websocket: WebSocketServer;
  connections: Map<WebSocket, string> = new Map();
  private pingTimer: ReturnType<typeof setInterval>;

  constructor(private manager: GatewayManager, private options: ServerOptions) {
    this.websocket = new WebSocketServer({ port: options.port });
    this.websocket.on("connection", (ws, request) => this.onConnection(ws, request));
    this.websocket.on("listening", () =>
      log.info(`WebSocket server listening on port ${options.port}`)
    );
    this.pingTimer = setInterval(() => this.ping(), options.pingIntervalMs);
  }

  close() {
    clearInterval(this.pingTimer);
    return new Promise<void>((resolve, reject) => {
      this.websocket.clients.forEach((ws) => ws.close(1001, "gateway shutting down"));
      this.websocket.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private onConnection(ws: WebSocket, request: IncomingMessage) {
    const endpoint = parseEndpoint(request.url);
    if (!endpoint) {
      ws.close(1008, "expected /drone/<id> or /operator/<id>");
      return;
    }

    const { role, id } = endpoint;
    const connection = new WsConnection(ws, this.options.highWaterMark);
    try {
      if (role === "drone") this.manager.connectDrone(id, connection);
      else this.manager.connectOperator(id, connection);
    } catch (error) {
      this.sendError(connection, id, error);
      ws.close(1008, "session rejected");
      return;
    }

    log.info(`WebSocket connected, ${role}: ${id}`);
    this.connections.set(ws, id);

    ws.on("pong", () => {
      if (this.manager.registry.find(id)) this.manager.heartbeat(id);
    });

    ws.on("message", (data: RawData) => {
      const raw = toText(data);
      const handled =
        role === "drone" ? this.onDroneMessage(id, raw) : this.onOperatorMessage(id, connection, raw);
      handled.catch((error) => this.sendError(connection, id, error));
    });

    // ws closes the socket after a protocol error; cleanup runs on "close".
    ws.on("error", (error) => {
      log.warn("WebSocket error", { session: id, error: describeError(error) });
    });

    ws.on("close", () => {
      log.info(`Websocket connection closed id: ${id}`);
      this.connections.delete(ws);
      this.manager.disconnect(id, connection).catch((error) =>
        log.error("Failed to clean up closed connection", { session: id, error: describeError(error) })
      );
    });
  }

  private async onDroneMessage(droneId: string, raw: string) {
    const message = parseDroneMessage(raw);
    switch (message.type) {
      case "telemetry":
        await this.manager.ingestTelemetry(droneId, message.payload);
        break;
      case "reply":
        this.manager.handleReply(droneId, message.payload);
        break;
      case "heartbeat":
        this.manager.heartbeat(droneId);
        break;
    }
  }

  private async onOperatorMessage(operatorId: string, connection: Connection, raw: string) {
    this.manager.heartbeat(operatorId);
    const message = parseOperatorMessage(raw);
    log.debug("ws>", { operator: operatorId, type: message.type });

    switch (message.type) {
      case "subscribe": {
        const status = this.manager.subscribe(operatorId, message.payload.droneId);
        if (status) connection.send({ type: "status", payload: { drones: [status] } });
        break;
      }
      case "unsubscribe":
        this.manager.unsubscribe(operatorId, message.payload.droneId);
        break;
      case "command":
        await this.manager.submitCommand(operatorId, message.payload);
        break;
      case "status": {
        const { droneId } = message.payload;
        const drones = droneId ? [this.manager.getStatus(droneId)] : this.manager.listStatus();
        connection.send({ type: "status", payload: { drones } });
        break;
      }
    }
  }

  private ping() {
    this.connections.forEach((_id, ws) => {
      if (ws.readyState === WebSocket.OPEN) ws.ping();
    });
  }

  private sendError(connection: Connection, id: string, error: unknown) {
    const code = isGatewayError(error) ? error.code : "InternalError";
    const message = describeError(error);
    if (isGatewayError(error)) log.info(`request failed: ${code}`, { session: id, message });
    else log.error("Unexpected error handling message", { session: id, error: message });

    if (!connection.isClosed) connection.send({ type: "error", payload: { code, message } });
  }
}
