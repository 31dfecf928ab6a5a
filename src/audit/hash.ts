/* ------------------------------------------------------------------
 * hash.ts  •  Canonical JSON + digest helpers for the audit chain
 * ------------------------------------------------------------------
 *  ▸ canonicalJSON(...)       – deterministic, key-sorted JSON stringifier
 *  ▸ digest(str, algo)        – SHA-256 (default) or BLAKE3 hex digest
 *  ▸ computeEntryHash(...)    – hex(digest(previousHash + canonical core))
 *
 *  Notes
 *  -----
 *  • SHA-256 goes through Node's built-in crypto so any system can
 *    re-verify an export without extra tooling
 *  • @napi-rs/blake-hash returns a Buffer → hex string
 * ------------------------------------------------------------------ */

import { createHash } from "node:crypto";
import { blake3 } from "@napi-rs/blake-hash";
import type { AuditEntry, HashAlgo, JSONValue } from "../types";

/** `previousHash` of the first entry of a trail that continues nothing. */
export const GENESIS_HASH = "0".repeat(64);

/* ---------- 1. Canonical JSON serializer -------------------------- *
 * Keys sorted A→Z at every depth, no whitespace. Identical content
 * always yields identical bytes, whatever order it was built in.
 * ------------------------------------------------------------------ */
export function canonicalJSON(val: JSONValue): string {
  if (val === null || typeof val !== "object") return JSON.stringify(val);

  if (Array.isArray(val)) return `[${val.map(canonicalJSON).join(",")}]`;

  const body = Object.keys(val)
    .sort()
    .map((k) => `${JSON.stringify(k)}:${canonicalJSON(val[k] ?? null)}`)
    .join(",");
  return `{${body}}`;
}

/* ---------- 2. Digest helper -------------------------------------- */
export function digest(payload: string, algo: HashAlgo = "sha256"): string {
  if (algo === "blake3") {
    return blake3(payload).toString("hex");
  }
  return createHash("sha256").update(payload).digest("hex");
}

/** Every hashed field of an entry, i.e. all but the two chain links. */
export type EntryCore = Omit<AuditEntry, "previousHash" | "entryHash">;

/* ---------- 3. Chain link ----------------------------------------- *
 * The field list is spelled out so an entry carrying extra keys
 * (e.g. parsed from a foreign export) hashes the same as ours.
 * ------------------------------------------------------------------ */
export function computeEntryHash(
  previousHash: string,
  core: EntryCore,
  algo: HashAlgo = "sha256"
): string {
  const hashed: JSONValue = {
    entryId: core.entryId,
    timestamp: core.timestamp,
    action: core.action,
    resourceType: core.resourceType,
    resourceId: core.resourceId,
    userId: core.userId,
    status: core.status,
    details: { ...core.details },
  };
  return digest(previousHash + canonicalJSON(hashed), algo);
}
