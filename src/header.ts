/**
 * Fixed 20-byte header and transaction ids, plus the length-field
 * substitution used when hashing a prefix of a message.
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |0 0|     STUN Message Type     |         Message Length        |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                         Magic Cookie                          |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                     Transaction ID (96 bits)                  |
 *  |                                                               |
 *  |                                                               |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * @category Header
 * @packageDocumentation
 */

import { randomBytes } from 'node:crypto';
import { HEADER_SIZE, MAGIC_COOKIE, TRANSACTION_ID_SIZE } from './constants.js';
import { readU16, readU32, toHex, toU16, writeU16, writeU32 } from './bytes.js';
import { StunConversionError, StunDecodeError } from './errors.js';
import type { MessageClass } from './types.js';

/**
 * 96-bit transaction id
 *
 * @category Header
 */
export class TransactionId {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Generates a cryptographically random transaction id
   */
  static random(): TransactionId {
    return new TransactionId(new Uint8Array(randomBytes(TRANSACTION_ID_SIZE)));
  }

  /**
   * Wraps 12 bytes (copied)
   *
   * @throws {@link StunDecodeError} if `bytes` is not 12 bytes long
   */
  static fromBytes(bytes: Uint8Array): TransactionId {
    if (bytes.length !== TRANSACTION_ID_SIZE) {
      throw new StunDecodeError(
        `Invalid transaction id length: expected ${TRANSACTION_ID_SIZE}, got ${bytes.length}`
      );
    }
    return new TransactionId(Uint8Array.from(bytes));
  }

  /**
   * Builds a transaction id from an integer, big-endian and right-aligned
   *
   * Handy for deterministic ids in tests.
   *
   * @throws {@link StunConversionError} if `value` is negative or wider than 96 bits
   */
  static fromNumber(value: number | bigint): TransactionId {
    let n = BigInt(value);
    if (n < 0n || n >= 1n << 96n) {
      throw new StunConversionError(value, 96);
    }

    const bytes = new Uint8Array(TRANSACTION_ID_SIZE);
    for (let i = TRANSACTION_ID_SIZE - 1; i >= 0; i--) {
      bytes[i] = Number(n & 0xffn);
      n >>= 8n;
    }
    return new TransactionId(bytes);
  }

  /** Copy of the 12 id bytes */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  equals(other: TransactionId): boolean {
    return this.bytes.every((b, i) => b === other.bytes[i]);
  }

  toString(): string {
    return toHex(this.bytes);
  }
}

/**
 * Decoded STUN header
 *
 * @category Header
 */
export interface StunHeader {
  class: MessageClass;
  method: number;
  /** Payload length (excludes the 20-byte header) */
  length: number;
  transactionId: TransactionId;
}

/**
 * Encodes method + class into the 16-bit message type.
 *
 * Bits are interleaved per RFC 8489 Section 5:
 *   M11-M7 | C1 | M6-M4 | C0 | M3-M0
 *
 * @category Header
 */
export function encodeMessageType(method: number, msgClass: MessageClass): number {
  if (!Number.isInteger(method) || method < 0 || method > 0x0fff) {
    throw new StunConversionError(method, 12);
  }

  return (
    (method & 0x000f) |
    ((msgClass & 0x1) << 4) |
    ((method & 0x0070) << 1) |
    ((msgClass & 0x2) << 7) |
    ((method & 0x0f80) << 2)
  );
}

/**
 * Decodes the 16-bit message type into method + class.
 *
 * @category Header
 */
export function decodeMessageType(type: number): {
  method: number;
  class: MessageClass;
} {
  const c0 = (type >> 4) & 0x1;
  const c1 = (type >> 8) & 0x1;
  const msgClass: MessageClass = (c1 << 1) | c0;
  const method =
    (type & 0x000f) | ((type >> 1) & 0x0070) | ((type >> 2) & 0x0f80);
  return { method, class: msgClass };
}

/**
 * Parses the first 20 bytes of a buffer into a StunHeader
 *
 * @category Header
 *
 * @throws {@link StunDecodeError} if the buffer is too short, the leading
 * bits are not zero, the magic cookie is wrong or the length is not a
 * multiple of 4
 */
export function parseHeader(data: Uint8Array): StunHeader {
  if (data.length < HEADER_SIZE) {
    throw new StunDecodeError(
      `Message too short: expected at least ${HEADER_SIZE} bytes, got ${data.length}`
    );
  }

  // First two bits must be 00
  if ((data[0] & 0xc0) !== 0) {
    throw new StunDecodeError('Invalid message type: leading bits must be zero');
  }

  const cookie = readU32(data, 4);
  if (cookie !== MAGIC_COOKIE) {
    throw new StunDecodeError(
      `Invalid magic cookie: expected 0x${MAGIC_COOKIE.toString(16)}, got 0x${cookie.toString(16)}`
    );
  }

  const length = readU16(data, 2);
  if (length % 4 !== 0) {
    throw new StunDecodeError(`Invalid message length: ${length} is not a multiple of 4`);
  }

  const { method, class: msgClass } = decodeMessageType(readU16(data, 0));

  return {
    class: msgClass,
    method,
    length,
    transactionId: TransactionId.fromBytes(data.subarray(8, HEADER_SIZE)),
  };
}

/**
 * Builds a 20-byte STUN header
 *
 * @category Header
 */
export function buildHeader(
  msgClass: MessageClass,
  method: number,
  transactionId: TransactionId,
  length: number
): Uint8Array {
  const header = new Uint8Array(HEADER_SIZE);
  writeU16(header, 0, encodeMessageType(method, msgClass));
  writeU16(header, 2, toU16(length));
  writeU32(header, 4, MAGIC_COOKIE);
  header.set(transactionId.toBytes(), 8);
  return header;
}

/**
 * Checks whether data looks like a STUN message without parsing attributes
 *
 * Useful for demultiplexing STUN from other traffic on the same port.
 *
 * @category Header
 *
 * @param data - Received bytes
 * @returns true if the header is valid and the declared length fits
 */
export function isStunMessage(data: Uint8Array): boolean {
  if (data.length < HEADER_SIZE) return false;
  if ((data[0] & 0xc0) !== 0) return false;
  if (readU32(data, 4) !== MAGIC_COOKIE) return false;

  const length = readU16(data, 2);
  return length % 4 === 0 && HEADER_SIZE + length <= data.length;
}

/**
 * Returns the bytes `buffer[0, end)` as they read with the header
 * length field set to `length`
 *
 * The buffer is not modified: the result is three chunks (message type,
 * substituted length, everything after the length field) meant to be fed
 * to a hash one after the other.
 *
 * @category Header
 */
export function withDeclaredLength(
  buffer: Uint8Array,
  end: number,
  length: number
): Uint8Array[] {
  const lengthField = new Uint8Array(2);
  writeU16(lengthField, 0, toU16(length));

  return [buffer.subarray(0, 2), lengthField, buffer.subarray(4, end)];
}
