import type { PacketFormat } from "@pitlog/shared/types";

export interface HeaderFields {
  packetFormat: PacketFormat;
  packetId: number;
  packetVersion?: number;
  gameMajorVersion?: number;
  gameMinorVersion?: number;
  sessionUID?: bigint;
  sessionTime?: number;
  frameIdentifier?: number;
  playerCarIndex?: number;
  /** 2020 only */
  secondaryPlayerCarIndex?: number;
}

export const HEADER_SIZE: Readonly<Record<PacketFormat, number>> = { 2019: 23, 2020: 24 };

/** Zero-filled datagram of `headerSize + bodySize` bytes with the header written. */
export function makePacket(fields: HeaderFields, bodySize: number): Buffer {
  const headerSize = HEADER_SIZE[fields.packetFormat];
  const buf = Buffer.alloc(headerSize + bodySize);
  writeHeader(buf, fields);
  return buf;
}

export function writeHeader(buf: Buffer, fields: HeaderFields): void {
  buf.writeUInt16LE(fields.packetFormat, 0);
  buf.writeUInt8(fields.gameMajorVersion ?? 1, 2);
  buf.writeUInt8(fields.gameMinorVersion ?? 0, 3);
  buf.writeUInt8(fields.packetVersion ?? 1, 4);
  buf.writeUInt8(fields.packetId, 5);
  buf.writeBigUInt64LE(fields.sessionUID ?? 1n, 6);
  buf.writeFloatLE(fields.sessionTime ?? 0, 14);
  buf.writeUInt32LE(fields.frameIdentifier ?? 0, 18);
  buf.writeUInt8(fields.playerCarIndex ?? 0, 22);
  if (fields.packetFormat === 2020) buf.writeUInt8(fields.secondaryPlayerCarIndex ?? 255, 23);
}

/** 2020 event datagram: code at the start of the body, details written by `fill`. */
export function makeEvent2020(code: string, fill?: (buf: Buffer, detailsOffset: number) => void): Buffer {
  const buf = makePacket({ packetFormat: 2020, packetId: 3 }, 11);
  buf.write(code, 24, "latin1");
  fill?.(buf, 28);
  return buf;
}
