import type { AuditEntry, ChainVerification, HashAlgo } from "../types";
import { computeEntryHash, GENESIS_HASH } from "./hash";
import { AuditExportSchema } from "./schema";

export interface VerifyOptions {
  /** Expected `previousHash` of the first entry (default: genesis) */
  anchorHash?: string;
  hashAlgo?: HashAlgo;
}

/**
 * Recomputes the chain front to back and stops at the first entry whose
 * link or content hash does not hold. Nothing is repaired.
 */
export function verifyChain(
  entries: readonly AuditEntry[],
  opts: VerifyOptions = {}
): ChainVerification {
  const algo = opts.hashAlgo ?? "sha256";
  let expectedPrev = opts.anchorHash ?? GENESIS_HASH;

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry === undefined) break;

    if (entry.previousHash !== expectedPrev) {
      return {
        valid: false,
        brokenAt: i,
        reason:
          i === 0
            ? "previousHash does not match the trail anchor"
            : "previousHash does not match the preceding entryHash",
      };
    }
    if (computeEntryHash(entry.previousHash, entry, algo) !== entry.entryHash) {
      return { valid: false, brokenAt: i, reason: "entryHash does not match entry content" };
    }
    expectedPrev = entry.entryHash;
  }

  return { valid: true };
}

/**
 * Verifies an {@link AuditTrail.exportJSON} document without a trail
 * instance, e.g. in an auditor's offline tooling.
 */
export function verifyExport(json: string, opts: VerifyOptions = {}): ChainVerification {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    return {
      valid: false,
      reason: `export is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const res = AuditExportSchema.safeParse(parsed);
  if (!res.success) {
    const issue = res.error.issues[0];
    const index = issue?.path[0];
    return {
      valid: false,
      ...(typeof index === "number" ? { brokenAt: index } : {}),
      reason: `export does not match the audit entry schema: ${
        issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "unknown issue"
      }`,
    };
  }

  return verifyChain(res.data, opts);
}
