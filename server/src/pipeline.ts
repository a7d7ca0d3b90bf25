import { PACKET_DESCRIPTIONS } from "@pitlog/shared/lookups";
import type { PacketDocument, PacketKind, PipelineStats } from "@pitlog/shared/types";
import { TelemetryDecodeError, UnknownEventCodeError, UnsupportedVariantError } from "./codec/errors.js";
import { packetToTree } from "./codec/tree.js";
import { type AnyDecodedPacket, decodePacket } from "./packets/index.js";

/** Destination for decoded packets (collector, session files, live feed, ...). */
export interface PacketSink {
  write(packet: AnyDecodedPacket, document: PacketDocument): void;
  /** Flush and release resources. */
  close(): void | Promise<void>;
}

export interface PipelineOptions {
  /** Kinds forwarded to sinks; other kinds are decoded and counted only. */
  packetKinds: readonly PacketKind[];
  sinks: readonly PacketSink[];
}

export interface Pipeline {
  /** Handle one datagram. Returns its document, or null if it was dropped. */
  onDatagram(msg: Buffer, receivedAt?: number): PacketDocument | null;
  getStats(): PipelineStats;
  close(): Promise<void>;
}

export function createPipeline(options: PipelineOptions): Pipeline {
  const forwardKinds = new Set(options.packetKinds);
  const sinks = [...options.sinks];

  const stats: PipelineStats = { received: 0, decoded: 0, forwarded: 0, byKind: {}, errors: {} };
  const reportedErrors = new Set<string>();

  // Report each distinct problem once; the stats line carries the counts.
  function countError(name: string, message: string): boolean {
    stats.errors[name] = (stats.errors[name] ?? 0) + 1;
    const key = `${name}: ${message}`;
    if (reportedErrors.has(key)) return false;
    reportedErrors.add(key);
    return true;
  }

  function onDecodeError(err: TelemetryDecodeError): void {
    if (!countError(err.name, err.message)) return;
    if (err instanceof UnsupportedVariantError || err instanceof UnknownEventCodeError) {
      console.warn(`[Decode] Protocol gap: ${err.message}`);
    } else {
      console.error(`[Decode] Dropped packet: ${err.message}`);
    }
  }

  function writeToSink(sink: PacketSink, packet: AnyDecodedPacket, document: PacketDocument): void {
    try {
      sink.write(packet, document);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (countError("SinkError", message)) console.error(`[pitlog] Sink failed: ${message}`);
    }
  }

  function onDatagram(msg: Buffer, receivedAt = Date.now()): PacketDocument | null {
    stats.received++;

    let packet: AnyDecodedPacket;
    try {
      packet = decodePacket(msg);
    } catch (err) {
      if (!(err instanceof TelemetryDecodeError)) throw err;
      onDecodeError(err);
      return null;
    }

    stats.decoded++;
    const seen = stats.byKind[packet.kind] ?? 0;
    if (seen === 0) {
      console.log(`[Decode] Receiving ${PACKET_DESCRIPTIONS[packet.kind].name} packets (F1 ${packet.format})`);
    }
    stats.byKind[packet.kind] = seen + 1;
    if (!forwardKinds.has(packet.kind)) return null;

    const document: PacketDocument = {
      kind: packet.kind,
      format: packet.format,
      receivedAt,
      data: packetToTree(packet),
    };
    for (const sink of sinks) writeToSink(sink, packet, document);
    stats.forwarded++;
    return document;
  }

  function getStats(): PipelineStats {
    return { ...stats, byKind: { ...stats.byKind }, errors: { ...stats.errors } };
  }

  async function close(): Promise<void> {
    await Promise.all(sinks.map((sink) => sink.close()));
  }

  return { onDatagram, getStats, close };
}

/** One-line summary for the periodic stats log. */
export function formatStats(stats: PipelineStats): string {
  const kinds = Object.entries(stats.byKind)
    .map(([kind, count]) => `${kind}=${count}`)
    .join(" ");
  const errors = Object.entries(stats.errors)
    .map(([name, count]) => `${name}=${count}`)
    .join(" ");
  return `received=${stats.received} decoded=${stats.decoded} forwarded=${stats.forwarded}${kinds ? ` | ${kinds}` : ""}${errors ? ` | errors: ${errors}` : ""}`;
}
