import type { LogLevel } from "@conquest/contracts";
import winston from "winston";

export type EngineLogger = winston.Logger;

export interface EngineLoggerOptions {
  level?: LogLevel;
  silent?: boolean;
}

export function createEngineLogger(options: EngineLoggerOptions = {}): EngineLogger {
  return winston.createLogger({
    level: options.level ?? "warn",
    silent: options.silent ?? false,
    defaultMeta: { service: "conquest-engine" },
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
  });
}
