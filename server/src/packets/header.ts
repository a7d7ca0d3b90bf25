import { MIN_HEADER_SIZE } from "@pitlog/shared/constants";
import type { TreeMap } from "@pitlog/shared/types";
import { MalformedHeaderError, TruncatedBufferError } from "../codec/errors.js";
import { f32, type Infer, struct, u16, u32, u64, u8 } from "../codec/layout.js";
import { type Read, readU16 } from "../codec/primitives.js";

const commonHeaderFields = {
  packetFormat: u16, // 2019, 2020
  gameMajorVersion: u8, // "X.00"
  gameMinorVersion: u8, // "1.XX"
  packetVersion: u8, // version of this packet type, all start from 1
  packetId: u8,
  sessionUID: u64,
  sessionTime: f32,
  frameIdentifier: u32,
  playerCarIndex: u8,
};

export const header2019 = struct(commonHeaderFields);

export const header2020 = struct({
  ...commonHeaderFields,
  secondaryPlayerCarIndex: u8, // splitscreen, 255 if none
});

export type PacketHeader2019 = Infer<typeof header2019>;
export type PacketHeader2020 = Infer<typeof header2020>;
export type PacketHeader = PacketHeader2019 | PacketHeader2020;

/**
 * Decodes the header at offset 0. The packetFormat field selects the layout;
 * formats outside the supported set are rejected rather than guessed.
 */
export function decodeHeader(buf: Buffer): Read<PacketHeader> {
  if (buf.length < MIN_HEADER_SIZE) {
    throw new TruncatedBufferError(0, MIN_HEADER_SIZE, buf.length);
  }

  const [packetFormat] = readU16(buf, 0);
  switch (packetFormat) {
    case 2019:
      return header2019.read(buf, 0);
    case 2020:
      return header2020.read(buf, 0);
    default:
      throw new MalformedHeaderError(packetFormat);
  }
}

export function headerToTree(header: PacketHeader): TreeMap {
  return "secondaryPlayerCarIndex" in header ? header2020.toTree(header) : header2019.toTree(header);
}
