import fs from "node:fs";
import path from "node:path";
import { trackName } from "@pitlog/shared/lookups";
import type { PacketDocument, PacketFormat, PacketKind } from "@pitlog/shared/types";
import type { AnyDecodedPacket } from "./packets/index.js";
import type { PacketSink } from "./pipeline.js";

export interface SessionMeta {
  sessionUID: string;
  format: PacketFormat;
  startedAt: string;
  endedAt: string | null;
  trackId: number | null;
  trackName: string | null;
  packets: number;
  byKind: Partial<Record<PacketKind, number>>;
}

export interface SessionRecorder extends PacketSink {
  /** Meta of the session being written, if any. */
  readonly current: SessionMeta | null;
}

export const IDLE_TIMEOUT_MS = 30_000;

/**
 * Writes every forwarded document to `<dataDir>/<timestamp>_session-<uid>.ndjson`,
 * one file per game session, with a `.meta.json` summary beside it.
 */
export function createSessionRecorder(dataDir: string): SessionRecorder {
  fs.mkdirSync(dataDir, { recursive: true });

  let stream: fs.WriteStream | null = null;
  let metaPath: string | null = null;
  let meta: SessionMeta | null = null;
  let idleTimer: NodeJS.Timeout | null = null;
  // Session whose file failed; its packets are skipped until the UID changes
  let failedSessionUID: string | null = null;

  function startSession(packet: AnyDecodedPacket, receivedAt: number): void {
    const startedAt = new Date(receivedAt);
    const timestamp = startedAt.toISOString().replace(/[:.]/g, "-").slice(0, 19);
    const sessionUID = packet.header.sessionUID.toString();
    const baseName = `${timestamp}_session-${sessionUID}`;

    const file = fs.createWriteStream(path.join(dataDir, `${baseName}.ndjson`), { flags: "a" });
    file.on("error", (err) => {
      console.error(`[Recorder] Session file error: ${err.message}`);
      if (stream !== file) return;
      failedSessionUID = sessionUID;
      endSession();
    });
    stream = file;
    metaPath = path.join(dataDir, `${baseName}.meta.json`);
    meta = {
      sessionUID,
      format: packet.format,
      startedAt: startedAt.toISOString(),
      endedAt: null,
      trackId: null,
      trackName: null,
      packets: 0,
      byKind: {},
    };

    console.log(`[Recorder] Session started: ${baseName}`);
  }

  // Settles once every ended session file is flushed
  let flushed: Promise<void> = Promise.resolve();

  function endSession(): void {
    if (!stream || !meta || !metaPath) return;

    if (idleTimer) clearTimeout(idleTimer);
    idleTimer = null;

    meta.endedAt = new Date().toISOString();
    try {
      fs.writeFileSync(metaPath, JSON.stringify(meta, null, 2));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Recorder] Could not write session meta: ${message}`);
    }

    const closing = stream;
    console.log(`[Recorder] Session ended: ${meta.packets} packets recorded`);

    stream = null;
    meta = null;
    metaPath = null;
    // end() calls back with the error on a failed stream, so this always settles
    const done = new Promise<void>((resolve) => {
      if (closing.destroyed) resolve();
      else closing.end(() => resolve());
    });
    flushed = flushed.then(() => done);
  }

  function resetIdleTimer(): void {
    if (idleTimer) clearTimeout(idleTimer);
    idleTimer = setTimeout(() => {
      console.log(`[Recorder] No data for ${IDLE_TIMEOUT_MS / 1000}s, ending session`);
      endSession();
    }, IDLE_TIMEOUT_MS);
  }

  function write(packet: AnyDecodedPacket, document: PacketDocument): void {
    // sessionUID 0 is sent outside sessions (menus, lobby)
    if (packet.header.sessionUID === 0n) return;

    const sessionUID = packet.header.sessionUID.toString();
    if (sessionUID === failedSessionUID) return;
    failedSessionUID = null;

    if (meta && meta.sessionUID !== sessionUID) {
      endSession();
    }
    if (!meta) startSession(packet, document.receivedAt);
    if (!stream || !meta) return;

    stream.write(`${JSON.stringify(document)}\n`);
    meta.packets++;
    meta.byKind[packet.kind] = (meta.byKind[packet.kind] ?? 0) + 1;

    if (packet.kind === "session" && meta.trackId === null) {
      meta.trackId = packet.body.trackId;
      meta.trackName = trackName(packet.body.trackId);
      console.log(`[Recorder] Track: ${meta.trackName ?? `unknown (${meta.trackId})`}`);
    }

    resetIdleTimer();
  }

  function close(): Promise<void> {
    endSession();
    return flushed;
  }

  return {
    write,
    close,
    get current() {
      return meta;
    },
  };
}
