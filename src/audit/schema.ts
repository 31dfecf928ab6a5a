/**
 * @module audit-schema
 * @description Runtime validation for audit input and exported entries.
 *
 * - {@link AuditActionSchema} guards `AuditTrail.logAction` arguments
 * - {@link AuditEntrySchema} / {@link AuditExportSchema} parse entries read
 *   back from a store or an export before their chain is recomputed
 */

import { z } from "zod";
import { AUDIT_STATUSES, type JSONObject, type JSONValue } from "../types";

export const JSONValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JSONValueSchema),
    z.record(JSONValueSchema),
  ])
);

export const JSONObjectSchema: z.ZodType<JSONObject> = z.record(JSONValueSchema);

const nonEmpty = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .refine((s) => s.trim() !== "", `${field} must not be empty`);

/**
 * Arguments of one `logAction` call.
 *
 * @example
 * ```typescript
 * AuditActionSchema.parse({
 *   action: "RECORD_VIEWED",
 *   resourceType: "PATIENT",
 *   resourceId: "p-1042",
 *   userId: "dr-smith",
 *   status: "SUCCESS",
 *   details: { reason: "follow-up" },
 * });
 * ```
 */
export const AuditActionSchema = z.object({
  action: nonEmpty("action"),
  resourceType: nonEmpty("resourceType"),
  resourceId: nonEmpty("resourceId"),
  userId: z.string().nullable(),
  status: z.enum(AUDIT_STATUSES),
  details: JSONObjectSchema.default({}),
});

const HEX_256 = /^[0-9a-f]{64}$/;

/** A 256-bit digest as 64 lowercase hex chars. */
export const HashSchema = z.string().regex(HEX_256, "hash must be 64 lowercase hex chars");

export const AuditEntrySchema = z.object({
  entryId: z.string().min(1),
  timestamp: z.string().datetime(),
  action: z.string().min(1),
  resourceType: z.string().min(1),
  resourceId: z.string().min(1),
  userId: z.string().nullable(),
  status: z.enum(AUDIT_STATUSES),
  details: JSONObjectSchema,
  previousHash: z.string().regex(HEX_256, "previousHash must be 64 lowercase hex chars"),
  entryHash: z.string().regex(HEX_256, "entryHash must be 64 lowercase hex chars"),
});

export const AuditExportSchema = z.array(AuditEntrySchema);
