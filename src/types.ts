/* ------------------------------------------------------------------
 * types.ts · shared primitive types for audit-core
 * ------------------------------------------------------------------ */

/**
 * Any value that survives `JSON.stringify` → `JSON.parse` unchanged.
 *
 * Log fields and audit details are normalised to this shape before they are
 * masked or hashed, so canonical serialisation never meets functions,
 * symbols, bigints or cycles.
 *
 * @example
 * ```typescript
 * const details: JSONValue = {
 *   modelVersion: "2.4.1",
 *   scores: [0.91, 0.07],
 *   reviewer: null,
 * };
 * ```
 */
export type JSONValue =
  | string
  | number
  | boolean
  | null
  | JSONValue[]
  | { [key: string]: JSONValue };

export type JSONObject = { [key: string]: JSONValue };

/** Severity of a structured log record, lowest first. */
export const LOG_LEVELS = [
  "DEBUG",
  "INFO",
  "WARNING",
  "ERROR",
  "CRITICAL",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** One emitted observation, frozen once built. */
export interface LogRecord {
  /** ISO-8601 UTC instant captured at call time */
  readonly timestamp: string;
  readonly level: LogLevel;
  /** Masked message text */
  readonly message: string;
  /** Emitting component, e.g. `inference.worker` */
  readonly loggerScope: string;
  readonly correlationId: string;
  /** Caller fields after normalisation and PHI masking */
  readonly fields: Readonly<JSONObject>;
}

/** Flattened record as written by sinks: reserved keys + caller fields. */
export type WireRecord = JSONObject & {
  timestamp: string;
  level: LogLevel;
  message: string;
  loggerScope: string;
  correlationId: string;
};

export const AUDIT_STATUSES = ["SUCCESS", "FAILURE"] as const;

export type AuditStatus = (typeof AUDIT_STATUSES)[number];

/** Digest used for the audit hash chain. Both produce 32-byte hex strings. */
export type HashAlgo = "sha256" | "blake3";

/** One compliance record in the hash-chained audit trail. */
export interface AuditEntry {
  readonly entryId: string;
  readonly timestamp: string;
  readonly action: string;
  readonly resourceType: string;
  readonly resourceId: string;
  /** Actor; null for system actions */
  readonly userId: string | null;
  readonly status: AuditStatus;
  /** Masked details, arbitrary depth */
  readonly details: Readonly<JSONObject>;
  /** entryHash of the predecessor, or the trail anchor for the first entry */
  readonly previousHash: string;
  readonly entryHash: string;
}

/** Result of recomputing a hash chain. `brokenAt` is a zero-based index. */
export interface ChainVerification {
  valid: boolean;
  brokenAt?: number;
  reason?: string;
}
