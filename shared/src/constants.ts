import type { PacketFormat, PacketKind } from "./types.js";

export const DEFAULT_UDP_PORT = 20777;
export const DEFAULT_WS_PORT = 4410;

/** Value of the header's packetId field for each packet kind. */
export const PACKET_IDS: Readonly<Record<PacketKind, number>> = {
  motion: 0,
  session: 1,
  lapData: 2,
  event: 3,
  participants: 4,
  carSetups: 5,
  carTelemetry: 6,
  carStatus: 7,
  finalClassification: 8,
  lobbyInfo: 9,
};

export const PACKET_KINDS = Object.keys(PACKET_IDS).filter(isPacketKind);

export function isPacketKind(value: string): value is PacketKind {
  return Object.hasOwn(PACKET_IDS, value);
}

/** Cars in every per-car array. */
export const CAR_COUNT: Readonly<Record<PacketFormat, number>> = {
  2019: 20,
  2020: 22,
};

/** Smallest header of any supported format (2019 has no secondary player index). */
export const MIN_HEADER_SIZE = 23;
