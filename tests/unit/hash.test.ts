import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import {
  GENESIS_HASH,
  canonicalJSON,
  computeEntryHash,
  digest,
  type EntryCore,
} from "../../src/audit/hash";

const core: EntryCore = {
  entryId: "e-1",
  timestamp: "2024-05-01T10:00:00.000Z",
  action: "LOGIN",
  resourceType: "USER",
  resourceId: "u1",
  userId: "admin",
  status: "SUCCESS",
  details: { b: 2, a: [1, { y: true, x: null }] },
};

describe("hash.ts", () => {
  describe("canonicalJSON", () => {
    it("should handle primitive values", () => {
      expect(canonicalJSON(null)).toBe("null");
      expect(canonicalJSON(123)).toBe("123");
      expect(canonicalJSON("test")).toBe('"test"');
      expect(canonicalJSON(true)).toBe("true");
    });

    it("should sort keys at every depth and keep array order", () => {
      expect(canonicalJSON({ z: [3, 2, 1], a: { c: 3, b: 2 }, m: null })).toBe(
        '{"a":{"b":2,"c":3},"m":null,"z":[3,2,1]}'
      );
    });

    it("should not depend on insertion order", () => {
      expect(canonicalJSON({ b: 1, a: 2 })).toBe(canonicalJSON({ a: 2, b: 1 }));
    });

    it("should escape strings like JSON.stringify", () => {
      expect(canonicalJSON({ 'k"ey': "line\nbreak" })).toBe('{"k\\"ey":"line\\nbreak"}');
    });
  });

  describe("digest", () => {
    it("should produce the standard SHA-256 hex digest by default", () => {
      expect(digest("abc")).toBe(
        "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
      );
    });

    it("should produce a 64-char BLAKE3 digest distinct from SHA-256", () => {
      const b3 = digest("same input", "blake3");
      expect(b3).toMatch(/^[0-9a-f]{64}$/);
      expect(b3).not.toBe(digest("same input", "sha256"));
      expect(digest("same input", "blake3")).toBe(b3);
    });
  });

  describe("computeEntryHash", () => {
    it("should hash previousHash followed by the canonical core", () => {
      const expected = createHash("sha256")
        .update(
          GENESIS_HASH +
            '{"action":"LOGIN","details":{"a":[1,{"x":null,"y":true}],"b":2},' +
            '"entryId":"e-1","resourceId":"u1","resourceType":"USER","status":"SUCCESS",' +
            '"timestamp":"2024-05-01T10:00:00.000Z","userId":"admin"}'
        )
        .digest("hex");

      expect(computeEntryHash(GENESIS_HASH, core)).toBe(expected);
    });

    it("should ignore fields outside the hashed core", () => {
      const withExtras = { ...core, previousHash: "f".repeat(64), entryHash: "e".repeat(64) };
      expect(computeEntryHash(GENESIS_HASH, withExtras)).toBe(computeEntryHash(GENESIS_HASH, core));
    });

    it("should change with the previous hash and with any content change", () => {
      const h = computeEntryHash(GENESIS_HASH, core);
      expect(computeEntryHash("1".repeat(64), core)).not.toBe(h);
      expect(computeEntryHash(GENESIS_HASH, { ...core, details: { b: 3 } })).not.toBe(h);
      expect(computeEntryHash(GENESIS_HASH, { ...core, userId: null })).not.toBe(h);
    });

    it("genesis is 64 zeros", () => {
      expect(GENESIS_HASH).toBe("0".repeat(64));
    });
  });
});
