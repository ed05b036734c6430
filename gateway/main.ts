import { loadConfig } from "./config.ts";
import { describeError } from "./errors.ts";
import { log, setLevel } from "./log.ts";
import { GatewayManager } from "./manager.ts";
import { Server } from "./websocketserver.ts";

const config = loadConfig();
setLevel(config.logLevel);

const manager = new GatewayManager(config);
manager.start();

const server = new Server(manager, {
  port: config.port,
  pingIntervalMs: Math.max(250, Math.floor(config.livenessTimeoutMs / 2)),
});

log.info("Drone gateway started", {
  livenessTimeoutMs: config.livenessTimeoutMs,
  commandAckTimeoutMs: config.commandAckTimeoutMs,
  subscriberBufferCapacity: config.subscriberBufferCapacity,
});

const shutdown = (signal: string) => {
  log.info(`Received ${signal}, shutting down`, manager.health());
  manager.stop();
  server
    .close()
    .then(() => process.exit(0))
    .catch((error) => {
      log.error("Failed to close WebSocket server", { error: describeError(error) });
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
