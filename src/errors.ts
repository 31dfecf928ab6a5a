import type { ZodIssue } from "zod";

export type AuditCoreErrorCode =
  | "VALIDATION"
  | "CONFIGURATION"
  | "STORE_CORRUPT"
  | "STORE_UNAVAILABLE";

/** Base class for faults this package raises to its callers. */
export class AuditCoreError extends Error {
  readonly code: AuditCoreErrorCode;

  constructor(code: AuditCoreErrorCode, message: string) {
    super(message);
    this.name = "AuditCoreError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Caller-input fault. Always raised, never swallowed. */
export class ValidationError extends AuditCoreError {
  constructor(message: string) {
    super("VALIDATION", message);
    this.name = "ValidationError";
  }
}

/**
 * Rejected `logAction` input. `issues` carries the zod findings so an API
 * layer can map them to a 4xx body.
 */
export class AuditValidationError extends ValidationError {
  readonly issues: readonly ZodIssue[];

  constructor(issues: readonly ZodIssue[]) {
    super(
      `Invalid audit action: ${issues
        .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
        .join("; ")}`
    );
    this.name = "AuditValidationError";
    this.issues = issues;
  }
}

export class ConfigurationError extends AuditCoreError {
  constructor(message: string) {
    super("CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

/**
 * A durable store returned something that is not an audit entry. `index`
 * is the zero-based position of the offending record.
 */
export class StoreCorruptionError extends AuditCoreError {
  readonly index: number;

  constructor(index: number, detail: string) {
    super("STORE_CORRUPT", `Audit store record ${index} is unreadable: ${detail}`);
    this.name = "StoreCorruptionError";
    this.index = index;
  }
}

/** An operation needed every committed entry persisted and the store refused. */
export class StoreUnavailableError extends AuditCoreError {
  readonly pending: number;

  constructor(pending: number, cause: string) {
    super(
      "STORE_UNAVAILABLE",
      `Audit store still rejects ${pending} committed entr${pending === 1 ? "y" : "ies"}: ${cause}`
    );
    this.name = "StoreUnavailableError";
    this.pending = pending;
  }
}

/** Best-effort description of a thrown value for diagnostics. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
