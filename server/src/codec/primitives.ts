import { TruncatedBufferError } from "./errors.js";

/** A decoded value and the offset just past it. */
export type Read<T> = [value: T, next: number];

// All multi-byte fields in the telemetry protocol are little-endian.

function ensureAvailable(buf: Buffer, offset: number, width: number): void {
  if (offset < 0 || offset + width > buf.length) {
    throw new TruncatedBufferError(offset, width, buf.length);
  }
}

export function readU8(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 1);
  return [buf.readUInt8(offset), offset + 1];
}

export function readU16(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 2);
  return [buf.readUInt16LE(offset), offset + 2];
}

export function readU32(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 4);
  return [buf.readUInt32LE(offset), offset + 4];
}

export function readU64(buf: Buffer, offset: number): Read<bigint> {
  ensureAvailable(buf, offset, 8);
  return [buf.readBigUInt64LE(offset), offset + 8];
}

export function readI8(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 1);
  return [buf.readInt8(offset), offset + 1];
}

export function readI16(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 2);
  return [buf.readInt16LE(offset), offset + 2];
}

export function readI32(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 4);
  return [buf.readInt32LE(offset), offset + 4];
}

export function readI64(buf: Buffer, offset: number): Read<bigint> {
  ensureAvailable(buf, offset, 8);
  return [buf.readBigInt64LE(offset), offset + 8];
}

export function readF32(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 4);
  return [buf.readFloatLE(offset), offset + 4];
}

export function readF64(buf: Buffer, offset: number): Read<number> {
  ensureAvailable(buf, offset, 8);
  return [buf.readDoubleLE(offset), offset + 8];
}

/** Copies `length` bytes, so the result outlives the datagram buffer. */
export function readFixedBytes(buf: Buffer, offset: number, length: number): Read<Buffer> {
  ensureAvailable(buf, offset, length);
  return [Buffer.from(buf.subarray(offset, offset + length)), offset + length];
}

/**
 * Reads a fixed-size character field. The text ends at the first NUL byte
 * (or at `length` when there is none); the whole field is always consumed.
 */
export function readFixedString(buf: Buffer, offset: number, length: number): Read<string> {
  ensureAvailable(buf, offset, length);
  const end = offset + length;
  const nul = buf.indexOf(0, offset);
  const textEnd = nul === -1 || nul > end ? end : nul;
  return [buf.toString("utf8", offset, textEnd), end];
}
