/**
 * Byte helpers shared by the header, builder and attribute codecs
 *
 * All multi-byte integers on the wire are big-endian.
 */

import { StunConversionError } from './errors.js';

/**
 * Checks that a value fits an unsigned 16-bit field
 *
 * @throws {@link StunConversionError} if it does not
 */
export function toU16(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new StunConversionError(value, 16);
  }
  return value;
}

/**
 * Checks that a value fits an unsigned 32-bit field
 *
 * @throws {@link StunConversionError} if it does not
 */
export function toU32(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new StunConversionError(value, 32);
  }
  return value;
}

/**
 * Rounds a length up to the next multiple of 4
 */
export function padded(length: number): number {
  return (length + 3) & ~3;
}

export function readU16(data: Uint8Array, offset: number): number {
  return (data[offset] << 8) | data[offset + 1];
}

export function readU32(data: Uint8Array, offset: number): number {
  return (
    ((data[offset] << 24) |
      (data[offset + 1] << 16) |
      (data[offset + 2] << 8) |
      data[offset + 3]) >>>
    0
  );
}

export function writeU16(data: Uint8Array, offset: number, value: number): void {
  data[offset] = (value >> 8) & 0xff;
  data[offset + 1] = value & 0xff;
}

export function writeU32(data: Uint8Array, offset: number, value: number): void {
  data[offset] = (value >>> 24) & 0xff;
  data[offset + 1] = (value >>> 16) & 0xff;
  data[offset + 2] = (value >>> 8) & 0xff;
  data[offset + 3] = value & 0xff;
}

/**
 * Encodes a 32-bit unsigned integer as 4 big-endian bytes
 */
export function u32Bytes(value: number): Uint8Array {
  const bytes = new Uint8Array(4);
  writeU32(bytes, 0, toU32(value));
  return bytes;
}

/**
 * Formats bytes as a lowercase hex string
 */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Growable byte buffer
 *
 * Backs the message builder: bytes are appended at the end and already
 * written bytes can be patched in place.
 */
export class ByteBuffer {
  private data: Uint8Array;
  private size = 0;

  constructor(initialCapacity = 128) {
    this.data = new Uint8Array(initialCapacity);
  }

  /** Number of bytes written */
  get length(): number {
    return this.size;
  }

  /** View of the written bytes (invalidated by the next append) */
  view(): Uint8Array {
    return this.data.subarray(0, this.size);
  }

  append(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.data.set(bytes, this.size);
    this.size += bytes.length;
  }

  appendZeros(count: number): void {
    this.reserve(count);
    this.data.fill(0, this.size, this.size + count);
    this.size += count;
  }

  appendU16(value: number): void {
    this.reserve(2);
    writeU16(this.data, this.size, toU16(value));
    this.size += 2;
  }

  /** Drops bytes past `length`; capacity is kept */
  truncate(length: number): void {
    if (length < this.size) {
      this.size = length;
    }
  }

  setU16(offset: number, value: number): void {
    writeU16(this.data, offset, toU16(value));
  }

  private reserve(extra: number): void {
    const needed = this.size + extra;
    if (needed <= this.data.length) return;

    let capacity = Math.max(this.data.length, 16);
    while (capacity < needed) {
      capacity *= 2;
    }

    const grown = new Uint8Array(capacity);
    grown.set(this.view());
    this.data = grown;
  }
}
