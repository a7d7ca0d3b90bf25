import type { PacketDocument } from "@pitlog/shared/types";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createCollectorSink, toCollectorEvent } from "../collector.js";
import type { CollectorConfig } from "../config.js";
import { decodePacket } from "../packets/index.js";
import { makeEvent2020 } from "./fixtures.js";

const config: CollectorConfig = {
  url: "http://collector.test/services/collector/event",
  token: "test-secret",
  batchSize: 2,
  flushIntervalMs: 60_000,
  requestTimeoutMs: 10_000,
  sourcetype: "f1:telemetry",
};

const packet = decodePacket(makeEvent2020("SSTA"));

const document = (receivedAt: number): PacketDocument => ({
  kind: "event",
  format: 2020,
  receivedAt,
  data: { eventStringCode: "SSTA" },
});

describe("toCollectorEvent", () => {
  it("wraps a document in a collector envelope", () => {
    expect(toCollectorEvent(document(1_700_000_000_250), "f1:telemetry", "rig-1")).toEqual({
      time: 1_700_000_000.25,
      host: "rig-1",
      source: "f1-2020:udp",
      sourcetype: "f1:telemetry:event",
      event: { eventStringCode: "SSTA" },
    });
  });
});

describe("createCollectorSink", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts a batch once it is full", async () => {
    const fetchMock = vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(null, { status: 200 }));
    const sink = createCollectorSink(config, "rig-1");

    sink.write(packet, document(1_000));
    expect(fetchMock).not.toHaveBeenCalled();
    expect(sink.pending).toBe(1);

    sink.write(packet, document(2_000));
    await sink.flush();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(config.url, {
      method: "POST",
      headers: {
        Authorization: "Splunk test-secret",
        "Content-Type": "application/json",
      },
      body: [
        '{"time":1,"host":"rig-1","source":"f1-2020:udp","sourcetype":"f1:telemetry:event","event":{"eventStringCode":"SSTA"}}',
        '{"time":2,"host":"rig-1","source":"f1-2020:udp","sourcetype":"f1:telemetry:event","event":{"eventStringCode":"SSTA"}}',
      ].join("\n"),
      signal: expect.any(AbortSignal),
    });
    expect(sink.pending).toBe(0);
    await sink.close();
  });

  it("sends what is left on close", async () => {
    const fetchMock = vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(null, { status: 200 }));
    const sink = createCollectorSink(config, "rig-1");

    sink.write(packet, document(1_000));
    await sink.close();

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(sink.pending).toBe(0);
  });

  it("counts and logs rejected batches", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValue(
      new Response("bad token", { status: 403, statusText: "Forbidden" }),
    );
    const sink = createCollectorSink(config, "rig-1");

    sink.write(packet, document(1_000));
    sink.write(packet, document(2_000));
    await sink.flush();

    expect(sink.failed).toBe(2);
    expect(console.error).toHaveBeenCalledWith("[Collector] 403 Forbidden: dropped 2 events");
    await sink.close();
  });

  it("counts batches that could not be sent", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValue(new Error("connect ECONNREFUSED"));
    const sink = createCollectorSink(config, "rig-1");

    sink.write(packet, document(1_000));
    await sink.close();

    expect(sink.failed).toBe(1);
    expect(console.error).toHaveBeenCalledWith("[Collector] Post failed (connect ECONNREFUSED): dropped 1 events");
  });

  it("gives up on a post that never gets an answer", async () => {
    vi.spyOn(globalThis, "fetch").mockReturnValue(new Promise<Response>(() => {}));
    const sink = createCollectorSink({ ...config, batchSize: 1, requestTimeoutMs: 100 }, "rig-1");

    sink.write(packet, document(1_000));
    sink.write(packet, document(2_000));
    await sink.close();

    expect(sink.failed).toBe(2);
    expect(console.error).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringMatching(/^\[Collector\] Post failed \(.*timeout\): dropped 1 events$/),
    );
  });

  it("does nothing on flush when the queue is empty", async () => {
    const fetchMock = vi.spyOn(globalThis, "fetch");
    const sink = createCollectorSink(config, "rig-1");
    await sink.flush();
    await sink.close();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
