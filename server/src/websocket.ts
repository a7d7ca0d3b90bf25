import http from "node:http";
import type { PacketDocument, PacketKind, PipelineStats } from "@pitlog/shared/types";
import { Server as SocketIOServer } from "socket.io";
import type { AnyDecodedPacket } from "./packets/index.js";
import type { PacketSink } from "./pipeline.js";

export interface LiveFeedEvents {
  packet: (document: PacketDocument) => void;
  stats: (stats: PipelineStats) => void;
}

export type LiveFeedServer = SocketIOServer<Record<never, never>, LiveFeedEvents>;

export const BROADCAST_HZ = 30;

/** Create an HTTP + Socket.IO server on the given port */
export function createWebSocketServer(port: number): LiveFeedServer {
  const httpServer = http.createServer();
  const io: LiveFeedServer = new SocketIOServer(httpServer, {
    cors: { origin: "*" },
  });

  io.on("connection", (socket) => {
    console.log(`[WS] Client connected: ${socket.id}`);
    socket.on("disconnect", () => {
      console.log(`[WS] Client disconnected: ${socket.id}`);
    });
  });

  httpServer.listen(port, () => {
    console.log(`[pitlog] Live feed on port ${port}`);
  });

  return io;
}

/**
 * Returns a per-kind gate that opens at most `hz` times a second. Motion and
 * telemetry arrive at the game's send rate; events are rare and always pass.
 */
export function createBroadcastThrottle(hz = BROADCAST_HZ, now: () => number = Date.now) {
  const interval = 1000 / hz;
  const lastSent = new Map<PacketKind, number>();

  return (kind: PacketKind): boolean => {
    if (kind === "event") return true;
    const t = now();
    const last = lastSent.get(kind);
    if (last !== undefined && t - last < interval) return false;
    lastSent.set(kind, t);
    return true;
  };
}

interface LiveFeedEmitter {
  emit(event: "packet", document: PacketDocument): unknown;
}

/** Forwards documents to connected clients as "packet" events, throttled per kind. */
export function createLiveFeedSink(
  io: LiveFeedEmitter,
  shouldBroadcast: (kind: PacketKind) => boolean = createBroadcastThrottle(),
): PacketSink {
  return {
    write(_packet: AnyDecodedPacket, document: PacketDocument) {
      if (shouldBroadcast(document.kind)) io.emit("packet", document);
    },
    close() {},
  };
}
