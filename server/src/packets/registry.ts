import { PACKET_IDS } from "@pitlog/shared/constants";
import type { PacketFormat, PacketKind } from "@pitlog/shared/types";
import { UnsupportedVariantError, type VariantKey } from "../codec/errors.js";
import type { StructType } from "../codec/layout.js";
import type { Read } from "../codec/primitives.js";
import { DecodedPacket } from "./decoded.js";
import * as f2019 from "./f1-2019.js";
import * as f2020 from "./f1-2020.js";
import { header2019, header2020, type PacketHeader } from "./header.js";

export interface PacketDefinition<P> {
  readonly format: PacketFormat;
  readonly kind: PacketKind;
  readonly packetId: number;
  readonly packetVersion: number;
  readonly headerSize: number;
  readonly bodySize: number;
  /** Top-level body field names, in wire order. */
  readonly fieldNames: readonly string[];
  /** Decodes the body starting at `offset`, the first byte after the header. */
  decode(buf: Buffer, offset: number, header: PacketHeader): Read<P>;
}

const HEADER_SIZES: Readonly<Record<PacketFormat, number>> = {
  2019: header2019.size,
  2020: header2020.size,
};

function define<F extends PacketFormat, K extends PacketKind, B>(
  format: F,
  kind: K,
  body: StructType<B>,
): PacketDefinition<DecodedPacket<F, K, B>> {
  return {
    format,
    kind,
    packetId: PACKET_IDS[kind],
    packetVersion: 1,
    headerSize: HEADER_SIZES[format],
    bodySize: body.size,
    fieldNames: body.fieldNames,
    decode(buf, offset, header) {
      const [record, next] = body.read(buf, offset);
      return [new DecodedPacket(format, kind, header, record, body), next];
    },
  };
}

// The only place packet formats are registered.
const DEFINITIONS = [
  define(2019, "motion", f2019.motion),
  define(2019, "session", f2019.session),
  define(2019, "lapData", f2019.laps),
  define(2019, "event", f2019.event),
  define(2019, "participants", f2019.participants),
  define(2019, "carSetups", f2019.carSetups),
  define(2019, "carTelemetry", f2019.carTelemetry),
  define(2019, "carStatus", f2019.carStatus),

  define(2020, "motion", f2020.motion),
  define(2020, "session", f2020.session),
  define(2020, "lapData", f2020.laps),
  define(2020, "event", f2020.event),
  define(2020, "participants", f2020.participants),
  define(2020, "carSetups", f2020.carSetups),
  define(2020, "carTelemetry", f2020.carTelemetry),
  define(2020, "carStatus", f2020.carStatus),
  define(2020, "finalClassification", f2020.finalClassification),
  define(2020, "lobbyInfo", f2020.lobbyInfo),
] as const;

/** Every packet the registry can produce, discriminated by `format` and `kind`. */
export type AnyDecodedPacket = ReturnType<(typeof DEFINITIONS)[number]["decode"]>[0];

export type AnyPacketDefinition = PacketDefinition<AnyDecodedPacket>;

function variantKey({ packetFormat, packetId, packetVersion }: VariantKey): string {
  return `${packetFormat}:${packetId}:${packetVersion}`;
}

const registry: ReadonlyMap<string, AnyPacketDefinition> = new Map(
  DEFINITIONS.map((definition): [string, AnyPacketDefinition] => [
    variantKey({
      packetFormat: definition.format,
      packetId: definition.packetId,
      packetVersion: definition.packetVersion,
    }),
    definition,
  ]),
);

export const packetDefinitions: readonly AnyPacketDefinition[] = DEFINITIONS;

/** Throws UnsupportedVariantError when nothing is registered for the variant. */
export function findDefinition(variant: VariantKey): AnyPacketDefinition {
  const definition = registry.get(variantKey(variant));
  if (!definition) {
    throw new UnsupportedVariantError({
      packetFormat: variant.packetFormat,
      packetId: variant.packetId,
      packetVersion: variant.packetVersion,
    });
  }
  return definition;
}
