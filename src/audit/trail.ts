/**
 * @module audit-trail
 * @description Append-only, hash-chained compliance ledger.
 *
 * Each entry commits to its own content and to the previous entry's hash:
 *
 *   entryHash = hex(digest(previousHash + canonicalJSON(core)))
 *
 * so any retroactive edit breaks the chain at the edited entry. Appends run
 * one at a time through a {@link SerialExecutor}; two concurrent callers can
 * never chain onto the same `lastHash`.
 *
 * The in-memory ledger is authoritative for the running process. A durable
 * {@link AuditStore} receives every entry after it is committed; store
 * faults, including appends that outlive `appendTimeoutMs`, are logged,
 * counted and retried, never surfaced to the caller.
 *
 * @example
 * ```typescript
 * const trail = await AuditTrail.open({ store: new JsonlAuditStore("audit.jsonl") });
 *
 * await trail.logAction("RECORD_VIEWED", "PATIENT", "p-1042", "dr-smith", "SUCCESS", {
 *   reason: "follow-up",
 * });
 *
 * trail.verifyIntegrity(); // true
 * ```
 */

import { randomUUID } from "node:crypto";
import {
  AuditValidationError,
  StoreCorruptionError,
  StoreUnavailableError,
  ValidationError,
  describeError,
} from "../errors";
import { defaultFilter, type PhiFilter } from "../filter/redactor";
import {
  auditEntriesTotal,
  auditStoreFailures,
  integrityFailures,
  pendingPersistence,
} from "../metrics";
import type {
  AuditEntry,
  AuditStatus,
  ChainVerification,
  HashAlgo,
  JSONObject,
} from "../types";
import { log } from "../utils/logger";
import { getActiveSpan, setSpanAttributes } from "../utils/otel";
import { SerialExecutor } from "../utils/serial";
import { computeEntryHash, GENESIS_HASH, type EntryCore } from "./hash";
import { AuditActionSchema } from "./schema";
import type { AuditStore } from "./store";
import { verifyChain } from "./verify";

export interface AuditTrailOptions {
  store?: AuditStore;
  filter?: PhiFilter;
  /** Default: sha256 */
  hashAlgo?: HashAlgo;
  /**
   * `previousHash` of the first entry. {@link AuditTrail.open} falls back to
   * the anchor the store recorded at its last rotation, then to genesis.
   */
  anchorHash?: string;
  /** Longest a store append may run before it counts as failed. Default: 5000 */
  appendTimeoutMs?: number;
  clock?: () => Date;
  idGenerator?: () => string;
}

export interface ArchiveResult {
  /** Anchor of the archived segment */
  anchorHash: string;
  /** Hash the next segment chains onto */
  lastHash: string;
  archivedAt: string;
  entries: readonly AuditEntry[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

export class AuditTrail {
  readonly hashAlgo: HashAlgo;

  private readonly store: AuditStore | undefined;
  private readonly filter: PhiFilter;
  private readonly clock: () => Date;
  private readonly newId: () => string;
  private readonly serial = new SerialExecutor();
  private readonly appendTimeoutMs: number;

  private ledger: AuditEntry[] = [];
  /** Committed entries the store has not accepted yet, oldest first */
  private readonly backlog: AuditEntry[] = [];
  /** Set while an append that outlived its deadline is still running */
  private stalled: Promise<void> | undefined;
  private _anchorHash: string;
  private _lastHash: string;

  constructor(opts: AuditTrailOptions = {}) {
    this.store = opts.store;
    this.filter = opts.filter ?? defaultFilter;
    this.hashAlgo = opts.hashAlgo ?? "sha256";
    this.clock = opts.clock ?? (() => new Date());
    this.newId = opts.idGenerator ?? randomUUID;
    this.appendTimeoutMs = opts.appendTimeoutMs ?? 5_000;
    this._anchorHash = opts.anchorHash ?? GENESIS_HASH;
    this._lastHash = this._anchorHash;
  }

  /**
   * Builds a trail over `opts.store` and loads what it holds. Entries are
   * loaded as stored; call {@link verifyIntegrity} to check them.
   */
  static async open(opts: AuditTrailOptions = {}): Promise<AuditTrail> {
    const anchorHash = opts.anchorHash ?? (await opts.store?.anchor?.());
    const trail = new AuditTrail({ ...opts, anchorHash });
    if (opts.store) {
      for await (const entry of opts.store.entries()) {
        trail.ledger.push(deepFreeze(entry));
        trail._lastHash = entry.entryHash;
      }
      log.debug(`Audit trail loaded ${trail.ledger.length} entries`);
    }
    return trail;
  }

  /**
   * Validates, masks `details`, chains and commits one entry.
   *
   * @throws {AuditValidationError} when any argument is malformed; nothing
   *   is committed in that case.
   */
  async logAction(
    action: string,
    resourceType: string,
    resourceId: string,
    userId: string | null = null,
    status: AuditStatus = "SUCCESS",
    details: JSONObject = {}
  ): Promise<AuditEntry> {
    const parsed = AuditActionSchema.safeParse({
      action,
      resourceType,
      resourceId,
      userId,
      status,
      details,
    });
    if (!parsed.success) throw new AuditValidationError(parsed.error.issues);

    const input = parsed.data;
    const masked = this.filter.filterRecord(input.details).value;

    return this.serial.run(async () => {
      await this.drainBacklog();

      const core: EntryCore = {
        entryId: this.newId(),
        timestamp: this.clock().toISOString(),
        action: input.action,
        resourceType: input.resourceType,
        resourceId: input.resourceId,
        userId: input.userId,
        status: input.status,
        details: masked,
      };
      const previousHash = this._lastHash;
      const entry: AuditEntry = deepFreeze({
        ...core,
        previousHash,
        entryHash: computeEntryHash(previousHash, core, this.hashAlgo),
      });

      this.ledger.push(entry);
      this._lastHash = entry.entryHash;

      auditEntriesTotal.inc({ status: entry.status });
      setSpanAttributes(getActiveSpan(), {
        "audit.entry_id": entry.entryId,
        "audit.entry_hash": entry.entryHash,
        "audit.action": entry.action,
      });

      await this.persist(entry);
      return entry;
    });
  }

  /**
   * Retries the persistence backlog. Resolves true once the store holds
   * every committed entry.
   */
  flush(): Promise<boolean> {
    return this.serial.run(async () => (await this.drainBacklog()) === undefined);
  }

  /** Committed entries the store has not accepted yet */
  get pendingPersistence(): number {
    return this.backlog.length;
  }

  verifyIntegrity(): boolean {
    return this.verifyIntegrityDetailed().valid;
  }

  verifyIntegrityDetailed(): ChainVerification {
    return this.report(
      verifyChain(this.ledger, { anchorHash: this._anchorHash, hashAlgo: this.hashAlgo }),
      "ledger"
    );
  }

  /**
   * Re-reads the durable store and verifies what it returns against this
   * trail's anchor. Without a store this is {@link verifyIntegrityDetailed}.
   */
  verifyStore(): Promise<ChainVerification> {
    const store = this.store;
    if (!store) return Promise.resolve(this.verifyIntegrityDetailed());

    return this.serial.run(async () => {
      const stored: AuditEntry[] = [];
      try {
        for await (const entry of store.entries()) stored.push(entry);
      } catch (err) {
        if (err instanceof StoreCorruptionError) {
          return this.report(
            { valid: false, brokenAt: err.index, reason: err.message },
            "store"
          );
        }
        throw err;
      }
      return this.report(
        verifyChain(stored, { anchorHash: this._anchorHash, hashAlgo: this.hashAlgo }),
        "store"
      );
    });
  }

  /* ---------- queries ---------------------------------------------- */

  /** Snapshot of all entries in append order */
  get entries(): readonly AuditEntry[] {
    return [...this.ledger];
  }

  get size(): number {
    return this.ledger.length;
  }

  get lastHash(): string {
    return this._lastHash;
  }

  get anchorHash(): string {
    return this._anchorHash;
  }

  getEntriesByUser(userId: string | null): AuditEntry[] {
    return this.ledger.filter((e) => e.userId === userId);
  }

  getEntriesForResource(resourceType: string, resourceId: string): AuditEntry[] {
    return this.ledger.filter(
      (e) => e.resourceType === resourceType && e.resourceId === resourceId
    );
  }

  getEntriesByAction(action: string): AuditEntry[] {
    return this.ledger.filter((e) => e.action === action);
  }

  /** The `count` most recent entries, newest first. */
  getLatestEntries(count = 10): AuditEntry[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError("count must be a non-negative integer");
    }
    if (count === 0) return [];
    return this.ledger.slice(-count).reverse();
  }

  /** Every entry with every field, append order. Verify with `verifyExport`. */
  exportJSON(): string {
    return JSON.stringify(this.ledger);
  }

  /**
   * Moves the current ledger out of the live trail. The store is rotated
   * when it supports it and records the old `lastHash` as its new anchor;
   * the trail re-anchors on it too, so later entries keep chaining onto the
   * archived segment across restarts.
   *
   * @throws {StoreUnavailableError} when earlier entries still wait for the
   *   store; the ledger is left untouched.
   */
  archive(): Promise<ArchiveResult> {
    return this.serial.run(async () => {
      const fault = await this.drainBacklog();
      if (fault !== undefined) {
        throw new StoreUnavailableError(this.backlog.length, describeError(fault));
      }

      const result: ArchiveResult = {
        anchorHash: this._anchorHash,
        lastHash: this._lastHash,
        archivedAt: this.clock().toISOString(),
        entries: Object.freeze([...this.ledger]),
      };

      await this.store?.rotate?.(this._lastHash);

      this.ledger = [];
      this._anchorHash = this._lastHash;
      log.info(`Archived ${result.entries.length} audit entries`, {
        anchorHash: result.anchorHash,
        lastHash: result.lastHash,
      });
      return result;
    });
  }

  /* ---------- persistence ------------------------------------------ */

  private async persist(entry: AuditEntry): Promise<void> {
    if (!this.store) return;

    // Entries reach the store in commit order, so every entry goes through
    // the backlog. A non-empty backlog was just retried by the caller.
    this.backlog.push(entry);
    if (this.backlog.length === 1) await this.drainBacklog();
    pendingPersistence.set(this.backlog.length);
  }

  /** Returns the error that stopped the drain, or undefined when empty. */
  private async drainBacklog(): Promise<unknown> {
    const store = this.store;
    if (!store) return undefined;

    let fault: unknown;
    while (this.backlog.length > 0) {
      const next = this.backlog[0];
      if (next === undefined) break;
      try {
        await this.append(store, next);
      } catch (err) {
        this.reportStoreFailure(err, next);
        fault = err ?? new Error("store rejected the entry");
        break;
      }
      this.backlog.shift();
    }
    pendingPersistence.set(this.backlog.length);
    return fault;
  }

  /**
   * One store append, bounded by `appendTimeoutMs`. A late append keeps
   * running; until it settles nothing else is sent, so the store still sees
   * entries in commit order.
   */
  private async append(store: AuditStore, entry: AuditEntry): Promise<void> {
    if (this.stalled) {
      throw new Error("an earlier audit store append has not settled");
    }

    const attempt = store.append(entry);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.appendTimeoutMs);
    });
    const outcome = await Promise.race([attempt.then(() => "done" as const), deadline]).finally(
      () => clearTimeout(timer)
    );
    if (outcome === "done") return;

    this.stalled = attempt.then(
      () => this.settleStalled(entry),
      (err: unknown) => this.settleStalled(entry, err ?? new Error("store rejected the entry"))
    );
    throw new Error(`audit store append did not settle within ${this.appendTimeoutMs}ms`);
  }

  private settleStalled(entry: AuditEntry, err?: unknown): void {
    this.stalled = undefined;
    if (err !== undefined) {
      log.warn("Late audit store append failed; entry stays in the backlog", {
        error: describeError(err),
        entryId: entry.entryId,
      });
      return;
    }
    // Only the backlog head is ever sent, and nothing is sent while stalled.
    if (this.backlog[0] === entry) this.backlog.shift();
    pendingPersistence.set(this.backlog.length);
    log.info("Late audit store append completed", { entryId: entry.entryId });
  }

  private reportStoreFailure(err: unknown, entry: AuditEntry): void {
    auditStoreFailures.inc();
    log.error("Audit store rejected an entry; kept in the persistence backlog", {
      error: describeError(err),
      entryId: entry.entryId,
      pending: this.backlog.length,
    });
  }

  private report(result: ChainVerification, source: "ledger" | "store"): ChainVerification {
    if (!result.valid) {
      integrityFailures.inc();
      log.error(`Audit ${source} integrity check failed`, {
        brokenAt: result.brokenAt,
        reason: result.reason,
      });
    }
    return result;
  }
}
