/**
 * @module audit-store
 * @description Durable backing for the audit trail.
 *
 * The in-memory ledger inside {@link AuditTrail} is authoritative for a
 * running process; a store only has to keep what it was given, in order,
 * and hand it back on the next start.
 */

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline";
import { StoreCorruptionError } from "../errors";
import type { AuditEntry } from "../types";
import { AuditEntrySchema, HashSchema } from "./schema";

export interface AuditStore {
  /** Persists one committed entry. Rejections are retried by the trail. */
  append(entry: AuditEntry): Promise<void>;
  /** Every stored entry in append order. */
  entries(): AsyncIterable<AuditEntry>;
  /**
   * Moves the current contents aside so a fresh segment can start, and
   * records `anchorHash` as the `previousHash` that segment begins from.
   */
  rotate?(anchorHash: string): Promise<void>;
  /** Anchor recorded by the last {@link rotate}; undefined before any. */
  anchor?(): Promise<string | undefined>;
}

function parseEntry(raw: unknown, index: number): AuditEntry {
  const res = AuditEntrySchema.safeParse(raw);
  if (!res.success) {
    throw new StoreCorruptionError(
      index,
      res.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")
    );
  }
  return res.data;
}

/** Array-backed store for tests and short-lived processes. */
export class MemoryAuditStore implements AuditStore {
  private records: unknown[] = [];
  private readonly segments: unknown[][] = [];
  private anchorHash: string | undefined;

  async append(entry: AuditEntry): Promise<void> {
    // Stored as a detached copy: later edits to the store must not reach the ledger.
    this.records.push(JSON.parse(JSON.stringify(entry)));
  }

  async *entries(): AsyncIterable<AuditEntry> {
    for (let i = 0; i < this.records.length; i++) {
      yield parseEntry(this.records[i], i);
    }
  }

  async rotate(anchorHash: string): Promise<void> {
    this.segments.push(this.records);
    this.records = [];
    this.anchorHash = anchorHash;
  }

  async anchor(): Promise<string | undefined> {
    return this.anchorHash;
  }

  /** Raw stored records; exposed so tests can simulate tampering. */
  get raw(): unknown[] {
    return this.records;
  }

  /** Segments moved aside by {@link rotate}, oldest first. */
  get archived(): readonly unknown[][] {
    return this.segments;
  }
}

/**
 * JSON-Lines file store. Appends are synchronous and fsync'd, so an entry
 * that was reported persisted survives a crash.
 *
 * @example
 * ```typescript
 * const trail = await AuditTrail.open({
 *   store: new JsonlAuditStore("/var/lib/audit/trail.jsonl"),
 * });
 * ```
 */
export class JsonlAuditStore implements AuditStore {
  readonly filePath: string;
  /** Sidecar holding the anchor of the active file */
  readonly anchorPath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.anchorPath = `${this.filePath}.anchor`;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  async append(entry: AuditEntry): Promise<void> {
    const fd = fs.openSync(this.filePath, "a");
    try {
      fs.writeSync(fd, JSON.stringify(entry) + "\n");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  async *entries(): AsyncIterable<AuditEntry> {
    if (!fs.existsSync(this.filePath)) return;

    const input = fs.createReadStream(this.filePath, { encoding: "utf8" });
    const lines = readline.createInterface({ input, crlfDelay: Infinity });

    let index = 0;
    try {
      for await (const line of lines) {
        if (line.trim() === "") continue;
        let raw: unknown;
        try {
          raw = JSON.parse(line);
        } catch (err) {
          throw new StoreCorruptionError(
            index,
            err instanceof Error ? err.message : String(err)
          );
        }
        yield parseEntry(raw, index);
        index++;
      }
    } finally {
      lines.close();
      input.destroy();
    }
  }

  /**
   * Renames the active file to `<file>.<ISO timestamp>` and writes
   * `anchorHash` to `<file>.anchor`, replacing it atomically.
   */
  async rotate(anchorHash: string): Promise<void> {
    if (fs.existsSync(this.filePath)) {
      const suffix = new Date().toISOString().replace(/[:.]/g, "-");
      fs.renameSync(this.filePath, `${this.filePath}.${suffix}`);
    }

    const tmp = `${this.anchorPath}.tmp`;
    const fd = fs.openSync(tmp, "w");
    try {
      fs.writeSync(fd, anchorHash + "\n");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmp, this.anchorPath);
  }

  async anchor(): Promise<string | undefined> {
    if (!fs.existsSync(this.anchorPath)) return undefined;

    const res = HashSchema.safeParse(fs.readFileSync(this.anchorPath, "utf8").trim());
    if (!res.success) {
      throw new StoreCorruptionError(
        0,
        `${this.anchorPath}: ${res.error.issues.map((i) => i.message).join("; ")}`
      );
    }
    return res.data;
  }
}
