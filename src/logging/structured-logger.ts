/**
 * @module structured-logger
 * @description Correlation-tagged, PHI-masked structured logging.
 *
 * Every call builds one frozen {@link LogRecord}:
 * - `timestamp` captured at call time
 * - `correlationId` from the active correlation scope (generated if unset)
 * - `message` and every string in `fields` masked by the PHI filter
 *
 * and hands it to a single {@link LogSink}. A log call never throws: sink
 * faults go to the internal diagnostics channel and are counted.
 *
 * @example
 * ```typescript
 * const logger = getLogger("inference.worker");
 *
 * runWithCorrelation(req.headers["x-request-id"], async () => {
 *   logger.info("Inference started", { modelVersion: "2.4.1" });
 *   logger.audit("INFERENCE_COMPLETED", "image:8841", user.id);
 * });
 * ```
 */

import {
  resolveCorrelationId,
  setCorrelationId as bindCorrelationId,
} from "../context/correlation";
import { describeError } from "../errors";
import { defaultFilter, type PhiFilter } from "../filter/redactor";
import { logRecordsTotal, sinkFailures } from "../metrics";
import {
  LOG_LEVELS,
  type AuditStatus,
  type JSONObject,
  type LogLevel,
  type LogRecord,
} from "../types";
import { log } from "../utils/logger";
import { normalizeFields, serializeError } from "./normalize";
import { WinstonSink, type LogSink } from "./sinks";

export type LogFields = Record<string, unknown>;

export interface StructuredLoggerOptions {
  sink: LogSink;
  filter?: PhiFilter;
  /** Records below this level are not built (default: DEBUG) */
  level?: LogLevel;
  /** Injected for tests */
  clock?: () => Date;
}

/**
 * Meta-field listing the paths whose values had to be stringified. Reserved:
 * a caller field of this name is dropped.
 */
export const DEGRADED_FIELDS_KEY = "_degradedFields";

const severity = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export class StructuredLogger {
  readonly scope: string;
  private readonly sink: LogSink;
  private readonly filter: PhiFilter;
  private readonly clock: () => Date;
  private minLevel: LogLevel;

  constructor(scope: string, opts: StructuredLoggerOptions) {
    this.scope = scope;
    this.sink = opts.sink;
    this.filter = opts.filter ?? defaultFilter;
    this.clock = opts.clock ?? (() => new Date());
    this.minLevel = opts.level ?? "DEBUG";
  }

  /** Binds `id` to the current correlation scope. Throws on an empty id. */
  setCorrelationId(id: string): void {
    bindCorrelationId(id);
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  set level(level: LogLevel) {
    this.minLevel = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return severity(level) >= severity(this.minLevel);
  }

  /** Same sink, filter and threshold under another scope name. */
  child(scope: string): StructuredLogger {
    return new StructuredLogger(scope, {
      sink: this.sink,
      filter: this.filter,
      level: this.minLevel,
      clock: this.clock,
    });
  }

  debug(message: string, fields?: LogFields): void {
    this.emit("DEBUG", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.emit("INFO", message, fields);
  }

  warning(message: string, fields?: LogFields): void {
    this.emit("WARNING", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.emit("ERROR", message, fields);
  }

  critical(message: string, fields?: LogFields): void {
    this.emit("CRITICAL", message, fields);
  }

  /** ERROR record with the failure under `error: { name, message, stack? }`. */
  exception(message: string, error: unknown, fields?: LogFields): void {
    this.emit("ERROR", message, { ...fields, error: serializeError(error) });
  }

  /**
   * Observability-only audit tag at INFO level. This does NOT write to the
   * hash-chained AuditTrail; use AuditTrail.logAction for compliance records.
   */
  audit(
    action: string,
    resource: string,
    userId: string | null = null,
    status: AuditStatus = "SUCCESS",
    fields?: LogFields
  ): void {
    this.emit("INFO", `AUDIT: ${action}`, {
      ...fields,
      eventType: "AUDIT",
      action,
      resource,
      userId,
      status,
    });
  }

  private emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level)) return;

    let record: LogRecord;
    try {
      record = this.build(level, message, fields ?? {});
    } catch (err) {
      log.error(`Failed to build log record in ${this.scope}`, {
        error: describeError(err),
      });
      return;
    }

    logRecordsTotal.inc({ level });
    try {
      const pending = this.sink.write(record);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => this.reportSinkFailure(err, record));
      }
    } catch (err) {
      this.reportSinkFailure(err, record);
    }
  }

  private build(level: LogLevel, message: string, fields: LogFields): LogRecord {
    const normalized = normalizeFields(
      Object.fromEntries(Object.entries(fields).filter(([key]) => key !== DEGRADED_FIELDS_KEY))
    );
    const filtered: JSONObject = this.filter.filterRecord(normalized.value).value;
    if (normalized.degraded.length > 0) {
      filtered[DEGRADED_FIELDS_KEY] = normalized.degraded;
    }

    return Object.freeze({
      timestamp: this.clock().toISOString(),
      level,
      message: this.filter.mask(String(message)),
      loggerScope: this.scope,
      correlationId: resolveCorrelationId(),
      fields: Object.freeze(filtered),
    });
  }

  private reportSinkFailure(err: unknown, record: LogRecord): void {
    sinkFailures.inc();
    log.error(`Log sink rejected ${record.level} record from ${record.loggerScope}`, {
      error: describeError(err),
      correlationId: record.correlationId,
    });
  }
}

let defaultSink: LogSink | undefined;

/**
 * Logger for `scope`. Without an explicit sink all such loggers share one
 * console WinstonSink.
 */
export function getLogger(
  scope: string,
  opts: Partial<StructuredLoggerOptions> = {}
): StructuredLogger {
  const sink = opts.sink ?? (defaultSink ??= new WinstonSink());
  return new StructuredLogger(scope, { ...opts, sink });
}
