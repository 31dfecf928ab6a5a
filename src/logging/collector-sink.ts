/**
 * @module collector-sink
 * @description Buffered batch transport to an external log collector.
 *
 * - Bounded in-memory ring buffer; on overflow the oldest record is
 *   dropped and counted, callers never block
 * - Flush when `batchSize` records are waiting or every `flushIntervalMs`
 * - Each batch is retried with exponential back-off, then dropped and
 *   reported through the diagnostics logger
 * - `close()` flushes best-effort within a deadline
 *
 * Wire format: `POST <url>` with a JSON array of wire records.
 */

import axios from "axios";
import { describeError } from "../errors";
import { recordsDropped, sinkFailures } from "../metrics";
import type { LogRecord, WireRecord } from "../types";
import { log } from "../utils/logger";
import { retry } from "../utils/retry";
import { RingBuffer } from "../utils/ring-buffer";
import { toWireRecord, type LogSink } from "./sinks";

/** The slice of an axios instance the sink uses. */
export interface HttpPoster {
  post(
    url: string,
    data: unknown,
    config: { headers: Record<string, string>; timeout: number }
  ): Promise<unknown>;
}

export interface CollectorSinkOptions {
  url: string;
  apiKey?: string;
  /** Records per POST (default: 50) */
  batchSize?: number;
  /** Timer-driven flush cadence (default: 2000 ms) */
  flushIntervalMs?: number;
  /** Ring buffer capacity (default: 1000) */
  capacity?: number;
  /** Retries after the first failed POST (default: 3) */
  retries?: number;
  retryBaseDelayMs?: number;
  timeoutMs?: number;
  client?: HttpPoster;
}

export class CollectorSink implements LogSink {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly batchSize: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly client: HttpPoster;
  private readonly ring: RingBuffer<WireRecord>;
  private readonly timer: NodeJS.Timeout;

  private inFlight: Promise<void> | null = null;
  private closed = false;
  private _failedBatches = 0;

  constructor(opts: CollectorSinkOptions) {
    this.url = opts.url;
    this.headers = {
      "content-type": "application/json",
      ...(opts.apiKey ? { "x-api-key": opts.apiKey } : {}),
    };
    this.batchSize = opts.batchSize ?? 50;
    this.retries = opts.retries ?? 3;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 250;
    this.timeoutMs = opts.timeoutMs ?? 5_000;
    this.client = opts.client ?? axios.create();
    this.ring = new RingBuffer<WireRecord>(opts.capacity ?? 1_000);

    /* Periodic timer for low-traffic flushes; never keeps the process alive. */
    this.timer = setInterval(() => {
      void this.flush();
    }, opts.flushIntervalMs ?? 2_000);
    this.timer.unref();
  }

  write(record: LogRecord): void {
    if (this.closed) {
      sinkFailures.inc();
      log.warn("CollectorSink is closed; record discarded", {
        loggerScope: record.loggerScope,
      });
      return;
    }

    if (this.ring.push(toWireRecord(record)) !== undefined) {
      recordsDropped.inc();
    }
    if (this.ring.length >= this.batchSize) {
      void this.flush();
    }
  }

  /**
   * Drains the buffer batch by batch. Concurrent callers share the same
   * in-flight drain. Never rejects.
   */
  flush(): Promise<void> {
    if (!this.inFlight) {
      this.inFlight = this.drain().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async close(deadlineMs = 5_000): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearInterval(this.timer);

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), deadlineMs);
    });

    const outcome = await Promise.race([this.flush().then(() => "done" as const), deadline]);
    clearTimeout(timer);

    if (outcome === "timeout") {
      log.warn(`CollectorSink shutdown deadline of ${deadlineMs} ms reached`, {
        pending: this.ring.length,
      });
    }
  }

  /** Records evicted by the drop-oldest policy */
  get dropped(): number {
    return this.ring.dropped;
  }

  /** Batches abandoned after exhausting retries */
  get failedBatches(): number {
    return this._failedBatches;
  }

  get pending(): number {
    return this.ring.length;
  }

  private async drain(): Promise<void> {
    while (this.ring.length > 0) {
      const batch = this.ring.popMany(this.batchSize);
      try {
        await retry(() => this.post(batch), {
          attempts: this.retries + 1,
          baseDelayMs: this.retryBaseDelayMs,
          onError: (err, attempt) =>
            log.verbose(`Collector POST attempt ${attempt} failed`, {
              error: describeError(err),
              url: this.url,
            }),
        });
      } catch (err) {
        this._failedBatches++;
        sinkFailures.inc();
        log.error(`Collector rejected a batch of ${batch.length} records; dropped`, {
          error: describeError(err),
          url: this.url,
        });
      }
    }
  }

  private async post(batch: WireRecord[]): Promise<void> {
    await this.client.post(this.url, batch, {
      headers: this.headers,
      timeout: this.timeoutMs,
    });
  }
}
