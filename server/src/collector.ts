import os from "node:os";
import type { PacketDocument, TreeMap } from "@pitlog/shared/types";
import type { CollectorConfig } from "./config.js";
import type { PacketSink } from "./pipeline.js";

/** HTTP event collector envelope; one per decoded packet. */
export interface CollectorEvent {
  time: number; // epoch seconds
  host: string;
  source: string;
  sourcetype: string;
  event: TreeMap;
}

export interface CollectorSink extends PacketSink {
  /** Send whatever is queued now. Resolves once the request has finished. */
  flush(): Promise<void>;
  readonly pending: number;
  readonly failed: number;
}

export function toCollectorEvent(document: PacketDocument, sourcetype: string, host: string): CollectorEvent {
  return {
    time: document.receivedAt / 1000,
    host,
    source: `f1-${document.format}:udp`,
    sourcetype: `${sourcetype}:${document.kind}`,
    event: document.data,
  };
}

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * Batches documents and posts them to an HTTP event collector as
 * newline-separated JSON. Posts run one at a time; a batch that fails or
 * outlives `requestTimeoutMs` is logged, counted and dropped.
 */
export function createCollectorSink(config: CollectorConfig, host = os.hostname()): CollectorSink {
  let queue: CollectorEvent[] = [];
  let inflight: Promise<void> = Promise.resolve();
  let failed = 0;

  async function post(batch: CollectorEvent[]): Promise<void> {
    const signal = AbortSignal.timeout(config.requestTimeoutMs);
    try {
      const request = fetch(config.url, {
        method: "POST",
        headers: {
          Authorization: `Splunk ${config.token}`,
          "Content-Type": "application/json",
        },
        body: batch.map((event) => JSON.stringify(event)).join("\n"),
        signal,
      });
      // The next batch waits on this one, so it must settle even if fetch ignores the signal.
      const res = await Promise.race([request, whenAborted(signal)]);
      if (!res.ok) {
        failed += batch.length;
        console.error(`[Collector] ${res.status} ${res.statusText}: dropped ${batch.length} events`);
      }
    } catch (err) {
      failed += batch.length;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Collector] Post failed (${message}): dropped ${batch.length} events`);
    }
  }

  function flush(): Promise<void> {
    if (queue.length > 0) {
      const batch = queue;
      queue = [];
      inflight = inflight.then(() => post(batch));
    }
    return inflight;
  }

  const timer = setInterval(() => {
    void flush();
  }, config.flushIntervalMs);
  timer.unref();

  function write(_packet: unknown, document: PacketDocument): void {
    queue.push(toCollectorEvent(document, config.sourcetype, host));
    if (queue.length >= config.batchSize) void flush();
  }

  async function close(): Promise<void> {
    clearInterval(timer);
    await flush();
  }

  return {
    write,
    flush,
    close,
    get pending() {
      return queue.length;
    },
    get failed() {
      return failed;
    },
  };
}
