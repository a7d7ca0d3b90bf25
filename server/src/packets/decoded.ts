import type { PacketFormat, PacketKind, TreeMap } from "@pitlog/shared/types";
import type { StructType } from "../codec/layout.js";
import type { Serializable } from "../codec/tree.js";
import { type PacketHeader, headerToTree } from "./header.js";

/** One datagram's header and body. Built per packet, never mutated. */
export class DecodedPacket<F extends PacketFormat, K extends PacketKind, B> implements Serializable {
  constructor(
    readonly format: F,
    readonly kind: K,
    readonly header: PacketHeader,
    readonly body: B,
    private readonly bodyType: StructType<B>,
  ) {}

  /** `{ header, ...bodyFields }`, each in declaration order. */
  toTree(): TreeMap {
    return { header: headerToTree(this.header), ...this.bodyType.toTree(this.body) };
  }
}
