import pino, { type Logger } from "pino";

const env = process.env["NODE_ENV"];

export const logger = pino({
  level: process.env["LOG_LEVEL"] ?? (env === "test" ? "silent" : "info"),
  transport:
    env !== "production" && env !== "test"
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
});

export function scopedLogger(scope: string): Logger {
  return logger.child({ scope });
}
