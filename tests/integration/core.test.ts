import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { verifyExport } from "../../src/audit/verify";
import { ConfigManager } from "../../src/config";
import { runWithCorrelation } from "../../src/context/correlation";
import { createAuditCore } from "../../src/core";
import { CollectorSink } from "../../src/logging/collector-sink";
import type { LogSink } from "../../src/logging/sinks";
import { WinstonSink } from "../../src/logging/sinks";
import type { LogRecord } from "../../src/types";

class CollectingSink implements LogSink {
  readonly records: LogRecord[] = [];
  readonly close = vi.fn((_deadlineMs?: number) => Promise.resolve());

  write(record: LogRecord): void {
    this.records.push(record);
  }
}

describe("createAuditCore", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "audit-core-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    ConfigManager.reset();
  });

  it("wires logger, filter and trail together", async () => {
    const sink = new CollectingSink();
    const core = await createAuditCore(
      { serviceName: "triage-api", logLevel: "INFO", diagnosticsLevel: "error" },
      { sink }
    );
    const logger = core.getLogger("triage.intake");

    runWithCorrelation("req-7", () => {
      logger.debug("not emitted");
      logger.info("Intake for a@b.com", { queue: "urgent" });
    });

    expect(core.config.serviceName).toBe("triage-api");
    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({
      level: "INFO",
      message: "Intake for [REDACTED_EMAIL]",
      loggerScope: "triage.intake",
      correlationId: "req-7",
      fields: { queue: "urgent" },
    });

    const entry = await core.trail.logAction("CASE_OPENED", "CASE", "c-77", "nurse-4", "SUCCESS", {
      contact: "555-123-4567",
    });
    expect(entry.details).toEqual({ contact: "[REDACTED_PHONE]" });
    expect(core.trail.verifyIntegrity()).toBe(true);
    expect(verifyExport(core.trail.exportJSON())).toEqual({ valid: true });

    await Promise.all([core.shutdown(), core.shutdown()]);
    expect(sink.close).toHaveBeenCalledTimes(1);
    expect(sink.close).toHaveBeenCalledWith(5_000);
  });

  it("persists the trail to the configured JSONL file and reloads it", async () => {
    const auditStorePath = path.join(dir, "trail.jsonl");
    const logFilePath = path.join(dir, "app.log");

    const core = await createAuditCore({ auditStorePath, logFilePath, diagnosticsLevel: "error" });
    expect(core.sink).toBeInstanceOf(WinstonSink);

    await core.trail.logAction("LOGIN", "USER", "u1", "admin");
    core.getLogger("auth").warning("written to file");
    await core.shutdown();

    expect(fs.readFileSync(auditStorePath, "utf8").trim().split("\n")).toHaveLength(1);
    await vi.waitFor(() =>
      expect(fs.readFileSync(logFilePath, "utf8")).toContain('"message":"written to file"')
    );

    const reopened = await createAuditCore(
      { auditStorePath, diagnosticsLevel: "error" },
      { sink: new CollectingSink() }
    );
    expect(reopened.trail.size).toBe(1);
    expect(reopened.trail.lastHash).toBe(core.trail.lastHash);
    expect(reopened.trail.verifyIntegrity()).toBe(true);
    await reopened.shutdown();
  });

  it("verifies an archived trail after a restart", async () => {
    const auditStorePath = path.join(dir, "trail.jsonl");
    const first = await createAuditCore(
      { auditStorePath, diagnosticsLevel: "error" },
      { sink: new CollectingSink() }
    );
    await first.trail.logAction("A", "DOC", "d1");
    const archived = await first.trail.archive();
    await first.trail.logAction("B", "DOC", "d1");
    await first.shutdown();

    const second = await createAuditCore(
      { auditStorePath, diagnosticsLevel: "error" },
      { sink: new CollectingSink() }
    );
    expect(second.trail.anchorHash).toBe(archived.lastHash);
    expect(second.trail.size).toBe(1);
    expect(second.trail.verifyIntegrityDetailed()).toEqual({ valid: true });
    await second.shutdown();
  });

  it("anchors a new trail on a configured hash", async () => {
    const anchorHash = "ab".repeat(32);
    const core = await createAuditCore(
      { anchorHash, diagnosticsLevel: "error" },
      { sink: new CollectingSink() }
    );

    const entry = await core.trail.logAction("A", "DOC", "d1");
    expect(entry.previousHash).toBe(anchorHash);
    expect(core.trail.verifyIntegrity()).toBe(true);
    await core.shutdown();
  });

  it("uses the collector sink when a collector url is configured", async () => {
    const core = await createAuditCore({
      diagnosticsLevel: "error",
      collector: { url: "http://collector.test/ingest", apiKey: "test-secret" },
    });

    expect(core.sink).toBeInstanceOf(CollectorSink);
    await core.shutdown();
  });

  it("rejects invalid overrides", async () => {
    await expect(createAuditCore({ shutdownDeadlineMs: -1 })).rejects.toThrow(
      "audit-core: invalid configuration: shutdownDeadlineMs: "
    );
  });
});
