import { Writable } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import winston from "winston";
import { WinstonSink, toWireRecord } from "../../src/logging/sinks";
import type { LogRecord } from "../../src/types";

const record: LogRecord = Object.freeze({
  timestamp: "2024-03-01T12:00:00.000Z",
  level: "WARNING",
  message: "quota nearly exhausted",
  loggerScope: "billing.quota",
  correlationId: "req-42",
  fields: Object.freeze({ tenant: "t-1", used: 0.93, message: "caller text" }),
});

function captureSink(): { sink: WinstonSink; lines: string[] } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    },
  });
  const sink = new WinstonSink({ transports: [new winston.transports.Stream({ stream })] });
  return { sink, lines };
}

describe("sinks.ts", () => {
  describe("toWireRecord", () => {
    it("flattens caller fields next to the reserved keys", () => {
      expect(toWireRecord(record)).toEqual({
        tenant: "t-1",
        used: 0.93,
        timestamp: "2024-03-01T12:00:00.000Z",
        level: "WARNING",
        message: "quota nearly exhausted",
        loggerScope: "billing.quota",
        correlationId: "req-42",
      });
    });
  });

  describe("WinstonSink", () => {
    it("writes one JSON object per record", async () => {
      const { sink, lines } = captureSink();

      sink.write(record);

      await vi.waitFor(() => expect(lines).toHaveLength(1));
      expect(JSON.parse(lines[0] ?? "")).toEqual(toWireRecord(record));
    });

    it("accepts every level, DEBUG included", async () => {
      const { sink, lines } = captureSink();

      sink.write({ ...record, level: "DEBUG" });
      sink.write({ ...record, level: "CRITICAL" });

      await vi.waitFor(() => expect(lines).toHaveLength(2));
      expect(lines.map((l) => JSON.parse(l).level)).toEqual(["DEBUG", "CRITICAL"]);
    });

    it("close() resolves", async () => {
      const { sink } = captureSink();
      sink.write(record);
      await expect(sink.close(500)).resolves.toBeUndefined();
    });
  });
});
