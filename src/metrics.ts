import { Counter, Gauge, Registry } from "prom-client";

export const registry = new Registry();

export const logRecordsTotal = new Counter({
  name: "audit_core_log_records_total",
  help: "Structured log records handed to a sink",
  labelNames: ["level"] as const,
  registers: [registry],
});

export const sinkFailures = new Counter({
  name: "audit_core_sink_failures_total",
  help: "Log records or batches a sink failed to accept",
  registers: [registry],
});

export const recordsDropped = new Counter({
  name: "audit_core_records_dropped_total",
  help: "Buffered log records discarded by the drop-oldest overflow policy",
  registers: [registry],
});

export const auditEntriesTotal = new Counter({
  name: "audit_core_audit_entries_total",
  help: "Audit entries committed to the hash chain",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const auditStoreFailures = new Counter({
  name: "audit_core_audit_store_failures_total",
  help: "Failed attempts to persist an audit entry to the durable store",
  registers: [registry],
});

export const integrityFailures = new Counter({
  name: "audit_core_integrity_failures_total",
  help: "Hash-chain verifications that found a break",
  registers: [registry],
});

export const pendingPersistence = new Gauge({
  name: "audit_core_audit_pending_persistence",
  help: "Committed audit entries not yet accepted by the durable store",
  registers: [registry],
});
