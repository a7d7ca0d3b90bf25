import type { TreeMap, TreeNode } from "@pitlog/shared/types";
import {
  type Read,
  readF32,
  readF64,
  readFixedString,
  readI16,
  readI32,
  readI8,
  readU16,
  readU32,
  readU64,
  readU8,
} from "./primitives.js";
import { bigintToTree, float32ToTree } from "./tree.js";

/**
 * A binary field descriptor: a fixed byte size, a reader that threads the
 * offset through, and the field's document form.
 */
export interface FieldType<T> {
  /** Encoded size in bytes. */
  readonly size: number;
  read(buf: Buffer, offset: number): Read<T>;
  toTree(value: T): TreeNode;
}

export interface StructType<T> extends FieldType<T> {
  /** Field names in declaration (and wire) order. */
  readonly fieldNames: readonly string[];
  toTree(value: T): TreeMap;
}

/**
 * A layout maps each record key to its field type.
 * Key insertion order is the binary layout; do not use computed keys.
 */
export type Layout<T> = {
  readonly [K in keyof T]: FieldType<T[K]>;
};

/** Record type produced by a field type. */
export type Infer<F> = F extends FieldType<infer T> ? T : never;

function integer(size: number, read: (buf: Buffer, offset: number) => Read<number>): FieldType<number> {
  return { size, read, toTree: (value) => value };
}

export const u8 = integer(1, readU8);
export const u16 = integer(2, readU16);
export const u32 = integer(4, readU32);
export const i8 = integer(1, readI8);
export const i16 = integer(2, readI16);
export const i32 = integer(4, readI32);

export const u64: FieldType<bigint> = { size: 8, read: readU64, toTree: bigintToTree };

export const f32: FieldType<number> = { size: 4, read: readF32, toTree: float32ToTree };
export const f64: FieldType<number> = { size: 8, read: readF64, toTree: (value) => value };

/** Fixed-size, NUL-terminated character buffer. */
export function text(length: number): FieldType<string> {
  return {
    size: length,
    read: (buf, offset) => readFixedString(buf, offset, length),
    toTree: (value) => value,
  };
}

/** Exactly `count` consecutive elements; the count never comes from the data. */
export function array<T>(element: FieldType<T>, count: number): FieldType<readonly T[]> {
  return {
    size: element.size * count,
    read(buf, offset) {
      const items: T[] = [];
      let cursor = offset;
      for (let i = 0; i < count; i++) {
        const [item, next] = element.read(buf, cursor);
        items.push(item);
        cursor = next;
      }
      return [items, cursor];
    },
    toTree: (items) => items.map((item) => element.toTree(item)),
  };
}

/** Tightly packed record; fields are read and emitted in layout order. */
export function struct<T extends object>(layout: Layout<T>): StructType<T> {
  const keys: Array<Extract<keyof T, string>> = [];
  let size = 0;
  for (const key in layout) {
    keys.push(key);
    size += layout[key].size;
  }

  return {
    size,
    fieldNames: keys,
    read(buf, offset) {
      const record: Partial<T> = {};
      let cursor = offset;
      for (const key of keys) {
        const [value, next] = layout[key].read(buf, cursor);
        record[key] = value;
        cursor = next;
      }
      // every layout key has been assigned above
      return [record as T, cursor];
    },
    toTree(record) {
      const node: TreeMap = {};
      for (const key of keys) {
        node[key] = layout[key].toTree(record[key]);
      }
      return node;
    },
  };
}
