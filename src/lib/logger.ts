import pino from "pino";

// stderr, so tables printed on stdout stay pipeable
export const log = pino({ level: process.env.LOG_LEVEL || "info" }, pino.destination(2));

export type Logger = typeof log;

export function setLogLevel(level: string) {
  log.level = level;
}
