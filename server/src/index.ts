import path from "node:path";
import { initConfig } from "./config.js";
import { createCollectorSink } from "./collector.js";
import { createPipeline, formatStats, type PacketSink } from "./pipeline.js";
import { createRaceLog } from "./race-log.js";
import { createSessionRecorder } from "./recorder.js";
import { createUdpSocket } from "./udp.js";
import { createLiveFeedSink, createWebSocketServer, type LiveFeedServer } from "./websocket.js";

// Config + data
const dataDir = process.env.PITLOG_DATA_DIR ?? path.join(process.cwd(), "data");
const config = initConfig(dataDir);

const sinks: PacketSink[] = [createRaceLog()];

if (config.collector) {
  sinks.push(createCollectorSink(config.collector));
  console.log(`[pitlog] Forwarding to collector at ${config.collector.url}`);
}

if (config.recordSessions) {
  sinks.push(createSessionRecorder(path.join(dataDir, "sessions")));
}

let io: LiveFeedServer | null = null;
if (config.wsPort > 0) {
  io = createWebSocketServer(config.wsPort);
  sinks.push(createLiveFeedSink(io));
}

const pipeline = createPipeline({ packetKinds: config.packetKinds, sinks });

// Send the current counters to each client as it connects
io?.on("connection", (socket) => {
  socket.emit("stats", pipeline.getStats());
});

const udp = createUdpSocket(config.udpHost, config.udpPort, (msg) => {
  pipeline.onDatagram(msg);
});

const statsTimer =
  config.statsIntervalMs > 0
    ? setInterval(() => {
        const stats = pipeline.getStats();
        console.log(`[pitlog] ${formatStats(stats)}`);
        io?.emit("stats", stats);
      }, config.statsIntervalMs)
    : null;

// Graceful shutdown
function shutdown(signal: string): void {
  console.log(`[pitlog] ${signal} received, shutting down`);
  if (statsTimer) clearInterval(statsTimer);
  udp.close();
  Promise.all([pipeline.close(), io?.close()])
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      console.error("[pitlog] Shutdown failed:", err);
      process.exit(1);
    });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
