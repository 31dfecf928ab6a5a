/* ------------------------------------------------------------------
 * sinks.ts  •  LogSink contract + winston-backed sink
 * ------------------------------------------------------------------
 *  ▸ toWireRecord(record)  – flatten to one JSON object, reserved keys win
 *  ▸ WinstonSink           – console (default), file, or custom transports
 * ------------------------------------------------------------------ */

import winston from "winston";
import type { LogLevel, LogRecord, WireRecord } from "../types";

/**
 * Destination for log records. `write` may return a promise; a rejection
 * is treated exactly like a synchronous throw (reported, never propagated).
 */
export interface LogSink {
  write(record: LogRecord): void | Promise<void>;
  flush?(): Promise<void>;
  close?(deadlineMs?: number): Promise<void>;
}

/** Caller fields first, then the reserved keys so they always win. */
export function toWireRecord(record: LogRecord): WireRecord {
  return {
    ...record.fields,
    timestamp: record.timestamp,
    level: record.level,
    message: record.message,
    loggerScope: record.loggerScope,
    correlationId: record.correlationId,
  };
}

/* winston picks the lowest number as most severe */
const SINK_LEVELS: Record<LogLevel, number> = {
  CRITICAL: 0,
  ERROR: 1,
  WARNING: 2,
  INFO: 3,
  DEBUG: 4,
};

export interface WinstonSinkOptions {
  /** Append JSON lines to this file instead of the console */
  filePath?: string;
  /** Overrides both of the above */
  transports?: winston.LoggerOptions["transports"];
}

/**
 * Writes one JSON object per record through winston. Filtering by level
 * happens in StructuredLogger, so the sink accepts everything.
 */
export class WinstonSink implements LogSink {
  private readonly logger: winston.Logger;

  constructor(opts: WinstonSinkOptions = {}) {
    const transports =
      opts.transports ??
      (opts.filePath
        ? [new winston.transports.File({ filename: opts.filePath })]
        : [new winston.transports.Console()]);

    this.logger = winston.createLogger({
      levels: SINK_LEVELS,
      level: "DEBUG",
      format: winston.format.json(),
      transports,
      exitOnError: false,
    });
  }

  write(record: LogRecord): void {
    this.logger.log(toWireRecord(record));
  }

  /** Ends the stream; resolves when transports drained or the deadline passed. */
  close(deadlineMs = 5_000): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, deadlineMs);
      timer.unref();
      this.logger.once("finish", () => {
        clearTimeout(timer);
        resolve();
      });
      this.logger.end();
    });
  }
}
