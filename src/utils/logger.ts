/* ------------------------------------------------------------------
 * logger.ts  •  Internal diagnostics channel for audit-core
 * ------------------------------------------------------------------
 *  ▸ Separate from StructuredLogger: sink and store faults are reported
 *    here so a broken sink can never recurse into itself.
 *  ▸ Level comes from ConfigManager.cfg.diagnosticsLevel.
 * ------------------------------------------------------------------ */

import winston from "winston";
import { ConfigManager, type DiagnosticsLevel } from "../config";

export type { DiagnosticsLevel };

type Meta = Record<string, unknown>;

let logger: winston.Logger | null = null;

function createLogger(): winston.Logger {
  const level = ConfigManager.cfg.diagnosticsLevel;

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({
        format: "YYYY-MM-DD HH:mm:ss",
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${timestamp}] [audit-core] [${level.toUpperCase()}]`;
        if (stack) {
          return `${prefix} ${message}\n${stack}`;
        }
        return `${prefix} ${message}`;
      })
    ),
    transports: [new winston.transports.Console({ stderrLevels: ["error", "warn"] })],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

export const log = {
  error: (message: string, meta?: Meta) => getLogger().error(message, meta),
  warn: (message: string, meta?: Meta) => getLogger().warn(message, meta),
  info: (message: string, meta?: Meta) => getLogger().info(message, meta),
  verbose: (message: string, meta?: Meta) => getLogger().verbose(message, meta),
  debug: (message: string, meta?: Meta) => getLogger().debug(message, meta),
};

export function setDiagnosticsLevel(level: DiagnosticsLevel): void {
  getLogger().level = level;
}
