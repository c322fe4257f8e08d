import pino from "pino";

export type Logger = pino.Logger;

// stdout carries command output (often --json); logs must go to stderr.
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || "warn",
    base: undefined
  },
  pino.destination({ fd: 2 })
);

export function createLogger(name: string): Logger {
  return logger.child({ name });
}

export function setLogLevel(level: pino.LevelWithSilent) {
  logger.level = level;
}
