export { createAuditCore } from "./core";
export { ConfigManager, resolveConfig, AuditCoreConfigSchema } from "./config";
export { registry } from "./metrics";

export {
  AuditCoreError,
  ValidationError,
  AuditValidationError,
  ConfigurationError,
  StoreCorruptionError,
  StoreUnavailableError,
} from "./errors";

export {
  PhiFilter,
  defaultFilter,
  mask,
  contains,
  detectCategories,
  filterStructured,
} from "./filter/redactor";
export { DEFAULT_CATEGORIES, redactionToken } from "./filter/categories";

export {
  runWithCorrelation,
  setCorrelationId,
  getCorrelationId,
  resolveCorrelationId,
} from "./context/correlation";

export { StructuredLogger, getLogger, DEGRADED_FIELDS_KEY } from "./logging/structured-logger";
export { WinstonSink, toWireRecord } from "./logging/sinks";
export { CollectorSink } from "./logging/collector-sink";

export { AuditTrail } from "./audit/trail";
export { MemoryAuditStore, JsonlAuditStore } from "./audit/store";
export { verifyChain, verifyExport } from "./audit/verify";
export { GENESIS_HASH, canonicalJSON, computeEntryHash } from "./audit/hash";

export type { AuditCore, AuditCoreDeps } from "./core";
export type { AuditCoreConfig, AuditCoreInit } from "./config";
export type { FilterResult } from "./filter/redactor";
export type { PhiCategory } from "./filter/categories";
export type { LogFields, StructuredLoggerOptions } from "./logging/structured-logger";
export type { LogSink, WinstonSinkOptions } from "./logging/sinks";
export type { CollectorSinkOptions, HttpPoster } from "./logging/collector-sink";
export type { AuditTrailOptions, ArchiveResult } from "./audit/trail";
export type { AuditStore } from "./audit/store";
export type { VerifyOptions } from "./audit/verify";
export type {
  AuditEntry,
  AuditStatus,
  ChainVerification,
  HashAlgo,
  JSONObject,
  JSONValue,
  LogLevel,
  LogRecord,
  WireRecord,
} from "./types";
