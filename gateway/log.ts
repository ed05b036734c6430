import winston from "winston";

const levels = ["error", "warn", "info", "debug"] as const;
type Level = (typeof levels)[number];

const isLevel = (value: string | undefined): value is Level =>
  levels.some((level) => level === value);

const formatter = winston.format.printf((info) => {
  const { level, message, drone, ...rest } = info;

  let msg = drone
    ? `[${level.toUpperCase()}][${String(drone)}] ${String(message)} `
    : `[${level.toUpperCase()}] ${String(message)} `;

  msg += Object.entries(rest)
    .map(([key, val]) => `${key}: ${JSON.stringify(val)}`)
    .join(", ");

  return msg.trimEnd();
});

export const log = winston.createLogger({
  level: isLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info",
  transports: [new winston.transports.Console({ format: formatter })],
});

export function setLevel(level: Level) {
  log.level = level;
}
