import pino from "pino";

// Diagnostics go to stderr; stdout belongs to the console.
export const logger = pino(
  {
    name: "scratch-console",
    level: process.env.SCRATCH_LOG_LEVEL || process.env.LOG_LEVEL || "warn",
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

export function createChildLogger(name: string): Logger {
  return logger.child({ component: name });
}
