import pino from "pino";

const env = process.env.NODE_ENV;

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport:
    env !== "production" && env !== "test"
      ? { target: "pino/file", options: { destination: 1 } }
      : undefined,
});

export type Logger = pino.Logger;

const children = new Set<Logger>();

export function createChildLogger(name: string): Logger {
  const child = logger.child({ component: name });
  children.add(child);
  return child;
}

/** Apply a level to the root logger and every component logger created so far. */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
