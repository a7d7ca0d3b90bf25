import type { PacketDocument } from "@pitlog/shared/types";
import { describe, expect, it } from "vitest";
import { packetToTree } from "../codec/tree.js";
import { decodePacket } from "../packets/index.js";
import type { PacketSink } from "../pipeline.js";
import { createRaceLog } from "../race-log.js";
import { makeEvent2020, makePacket } from "./fixtures.js";

function feed(sink: PacketSink, buf: Buffer): void {
  const packet = decodePacket(buf);
  const document: PacketDocument = { kind: packet.kind, format: packet.format, receivedAt: 0, data: packetToTree(packet) };
  sink.write(packet, document);
}

function participants2020(): Buffer {
  const buf = makePacket({ packetFormat: 2020, packetId: 4 }, 1189);
  buf.writeUInt8(4, 24);
  // car 0: driver 7, team 0, no name
  buf.set([1, 7, 0, 44, 10], 25);
  // car 3: named
  buf.set([0, 9, 1, 33, 22], 25 + 3 * 54);
  buf.write("Player One", 25 + 3 * 54 + 5, "utf8");
  return buf;
}

describe("createRaceLog", () => {
  it("announces the session track once", () => {
    const lines: string[] = [];
    const log = createRaceLog((line) => lines.push(line));
    const session = makePacket({ packetFormat: 2020, packetId: 1, sessionUID: 9n }, 227);
    session.writeUInt8(58, 24 + 3);
    session.writeUInt8(5, 24 + 7);

    feed(log, session);
    feed(log, session);

    expect(lines).toEqual(["[Race] Session 9 at Monaco, 58 laps"]);
  });

  it("names drivers from the participants packet", () => {
    const lines: string[] = [];
    const log = createRaceLog((line) => lines.push(line));
    feed(log, participants2020());

    feed(
      log,
      makeEvent2020("FTLP", (b, at) => {
        b.writeUInt8(3, at);
        b.writeFloatLE(78.456, at + 1);
      }),
    );
    feed(
      log,
      makeEvent2020("PENA", (b, at) => {
        b.set([4, 7, 0, 255, 5, 12, 0], at);
      }),
    );
    feed(
      log,
      makeEvent2020("RTMT", (b, at) => {
        b.writeUInt8(15, at);
      }),
    );

    expect(lines).toEqual([
      "[Race] Fastest Lap: Player One (Ferrari) 78.456s",
      "[Race] Penalty issued: Lewis Hamilton (Mercedes) Time penalty for Corner cutting gained time (lap 12)",
      "[Race] Retirement: car 15",
    ]);
  });

  it("logs events without details by their description", () => {
    const lines: string[] = [];
    const log = createRaceLog((line) => lines.push(line));
    feed(log, makeEvent2020("DRSE"));
    expect(lines).toEqual(["[Race] DRS enabled"]);
  });

  it("forgets participants when the session changes", () => {
    const lines: string[] = [];
    const log = createRaceLog((line) => lines.push(line));
    feed(log, participants2020());

    const other = makeEvent2020("RCWN", (b, at) => {
      b.writeUInt8(3, at);
    });
    other.writeBigUInt64LE(2n, 6);
    feed(log, other);

    expect(lines).toEqual(["[Race] Race Winner: car 3"]);
  });
});
