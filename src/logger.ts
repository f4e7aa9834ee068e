import { pino } from "pino";
import type { Logger } from "pino";
import { config } from "./config.js";

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: "pump-mint-harvester" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}
