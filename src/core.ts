import {
  ConfigManager,
  type AuditCoreConfig,
  type AuditCoreInit,
} from "./config";
import { describeError } from "./errors";
import { defaultFilter, type PhiFilter } from "./filter/redactor";
import { CollectorSink } from "./logging/collector-sink";
import { WinstonSink, type LogSink } from "./logging/sinks";
import { StructuredLogger } from "./logging/structured-logger";
import { JsonlAuditStore, MemoryAuditStore, type AuditStore } from "./audit/store";
import { AuditTrail } from "./audit/trail";
import { log, setDiagnosticsLevel } from "./utils/logger";

export interface AuditCoreDeps {
  /** Replaces the configured sink */
  sink?: LogSink;
  /** Replaces the configured store */
  store?: AuditStore;
  filter?: PhiFilter;
}

export interface AuditCore {
  config: Readonly<AuditCoreConfig>;
  filter: PhiFilter;
  sink: LogSink;
  trail: AuditTrail;
  getLogger(scope: string): StructuredLogger;
  /**
   * Retries unpersisted audit entries and flushes the sink, both bounded by
   * `shutdownDeadlineMs`. Never rejects.
   */
  shutdown(): Promise<void>;
}

function buildSink(cfg: AuditCoreConfig): LogSink {
  const { collector } = cfg;
  if (collector.url) {
    return new CollectorSink({
      url: collector.url,
      apiKey: collector.apiKey,
      batchSize: collector.batchSize,
      flushIntervalMs: collector.flushIntervalMs,
      capacity: collector.bufferCapacity,
      retries: collector.retries,
    });
  }
  return new WinstonSink({ filePath: cfg.logFilePath });
}

function buildStore(cfg: AuditCoreConfig): AuditStore {
  return cfg.auditStorePath
    ? new JsonlAuditStore(cfg.auditStorePath)
    : new MemoryAuditStore();
}

function withDeadline<T>(task: Promise<T>, ms: number): Promise<T | "timeout"> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), ms);
  });
  return Promise.race([task, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Loads configuration (defaults < `AUDIT_CORE_RC` YAML < env < overrides)
 * and wires filter, sink, logger factory and audit trail together.
 *
 * @example
 * ```typescript
 * const core = await createAuditCore({ serviceName: "triage-api" });
 * const logger = core.getLogger("triage.intake");
 *
 * logger.info("Intake received", { queue: "urgent" });
 * await core.trail.logAction("CASE_OPENED", "CASE", "c-77", "nurse-4");
 *
 * process.on("SIGTERM", () => void core.shutdown());
 * ```
 */
export async function createAuditCore(
  overrides: AuditCoreInit = {},
  deps: AuditCoreDeps = {}
): Promise<AuditCore> {
  const config = ConfigManager.load(overrides);
  setDiagnosticsLevel(config.diagnosticsLevel);

  const filter = deps.filter ?? defaultFilter;
  const sink = deps.sink ?? buildSink(config);
  const trail = await AuditTrail.open({
    store: deps.store ?? buildStore(config),
    filter,
    hashAlgo: config.hashAlgo,
    anchorHash: config.anchorHash,
    appendTimeoutMs: config.storeTimeoutMs,
  });

  const root = new StructuredLogger(config.serviceName, {
    sink,
    filter,
    level: config.logLevel,
  });

  let closing: Promise<void> | undefined;

  const shutdown = async (): Promise<void> => {
    const deadlineMs = config.shutdownDeadlineMs;
    try {
      const persisted = await withDeadline(trail.flush(), deadlineMs);
      if (persisted !== true) {
        log.warn("Shutting down with unpersisted audit entries", {
          pending: trail.pendingPersistence,
        });
      }
      await withDeadline(sink.close?.(deadlineMs) ?? Promise.resolve(), deadlineMs);
    } catch (err) {
      log.error("audit-core shutdown failed", { error: describeError(err) });
    }
  };

  log.verbose(`audit-core ready for ${config.serviceName}`, {
    hashAlgo: config.hashAlgo,
    entries: trail.size,
  });

  return {
    config,
    filter,
    sink,
    trail,
    getLogger: (scope: string) => root.child(scope),
    shutdown: () => (closing ??= shutdown()),
  };
}
