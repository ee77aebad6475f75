import pino, { type Logger } from "pino";

export type { Logger };

export const rootLogger: Logger = pino({
  name: "a2a-task-engine",
  level: process.env.LOG_LEVEL ?? "info",
});

/** Child logger tagged with the module that writes through it. */
export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}
