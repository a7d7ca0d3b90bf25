import type { TreeMap, TreeNode } from "@pitlog/shared/types";
import type { FieldType } from "./layout.js";

/** Anything that can enumerate its own fields into a document. */
export interface Serializable {
  toTree(): TreeMap;
}

/**
 * Converts a decoded record or sub-record to its document form by walking the
 * declared field list of its layout. Field order and names are the layout's.
 */
export function toTree<T>(value: T, type: FieldType<T>): TreeNode {
  return type.toTree(value);
}

/** Document form of a whole decoded packet. */
export function packetToTree(packet: Serializable): TreeMap {
  return packet.toTree();
}

/**
 * Shortest decimal that reads back as the same 32-bit float, so a lap time
 * sent as 78.456f is emitted as 78.456 rather than 78.45600128173828.
 */
export function float32ToTree(value: number): number {
  if (!Number.isFinite(value)) return value;
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Object.is(Math.fround(candidate), value)) return candidate;
  }
  return value;
}

/** Decimal text; 64-bit ids do not fit a double exactly. */
export function bigintToTree(value: bigint): string {
  return value.toString();
}
