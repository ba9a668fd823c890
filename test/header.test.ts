/**
 * Header module tests
 *
 * Tests for message type interleaving, header parse/build and transaction ids
 */

import { describe, it, expect } from 'vitest';
import {
  TransactionId,
  parseHeader,
  buildHeader,
  encodeMessageType,
  decodeMessageType,
  isStunMessage,
  withDeclaredLength,
  MessageClass,
  Method,
  StunConversionError,
  StunDecodeError,
} from '../src/index.js';
import { TEST_TRANSACTION_ID } from './fixtures.js';

describe('Message type', () => {
  it('should encode Binding in every class', () => {
    expect(encodeMessageType(Method.Binding, MessageClass.Request)).toBe(0x0001);
    expect(encodeMessageType(Method.Binding, MessageClass.Indication)).toBe(0x0011);
    expect(encodeMessageType(Method.Binding, MessageClass.Success)).toBe(0x0101);
    expect(encodeMessageType(Method.Binding, MessageClass.Error)).toBe(0x0111);
  });

  it('should interleave the largest method with the error class', () => {
    expect(encodeMessageType(0x0fff, MessageClass.Error)).toBe(0x3fff);
    expect(decodeMessageType(0x3fff)).toEqual({
      method: 0x0fff,
      class: MessageClass.Error,
    });
  });

  it('should decode a success response', () => {
    expect(decodeMessageType(0x0101)).toEqual({
      method: Method.Binding,
      class: MessageClass.Success,
    });
  });

  it('should reject methods wider than 12 bits', () => {
    expect(() => encodeMessageType(0x1000, MessageClass.Request)).toThrow(StunConversionError);
  });
});

describe('Header', () => {
  it('should build the fixed 20-byte layout', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 8);

    expect(header.length).toBe(20);
    expect(Array.from(header.subarray(0, 8))).toEqual([
      0x00, 0x01, 0x00, 0x08, 0x21, 0x12, 0xa4, 0x42,
    ]);
    expect(header.subarray(8)).toEqual(TEST_TRANSACTION_ID.toBytes());
  });

  it('should parse what it builds', () => {
    const header = buildHeader(MessageClass.Success, Method.Binding, TEST_TRANSACTION_ID, 12);
    const parsed = parseHeader(header);

    expect(parsed.class).toBe(MessageClass.Success);
    expect(parsed.method).toBe(Method.Binding);
    expect(parsed.length).toBe(12);
    expect(parsed.transactionId.equals(TEST_TRANSACTION_ID)).toBe(true);
  });

  it('should reject buffers shorter than the header', () => {
    expect(() => parseHeader(new Uint8Array(19))).toThrow(StunDecodeError);
    expect(() => parseHeader(new Uint8Array(19))).toThrow(/too short/i);
  });

  it('should reject non-zero leading bits', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 0);
    header[0] |= 0x40;

    expect(() => parseHeader(header)).toThrow(/leading bits/i);
  });

  it('should reject a wrong magic cookie', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 0);
    header[4] = 0x00;

    expect(() => parseHeader(header)).toThrow(/magic cookie/i);
  });

  it('should reject a length that is not a multiple of 4', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 6);

    expect(() => parseHeader(header)).toThrow(/multiple of 4/i);
  });

  it('should reject a length wider than 16 bits when building', () => {
    expect(() =>
      buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 0x10000)
    ).toThrow(StunConversionError);
  });
});

describe('isStunMessage', () => {
  it('should accept a bare header', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 0);
    expect(isStunMessage(header)).toBe(true);
  });

  it('should reject when the declared length exceeds the data', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 4);
    expect(isStunMessage(header)).toBe(false);
  });

  it('should reject other protocols', () => {
    // RTP version 2 header
    const rtp = new Uint8Array(24);
    rtp[0] = 0x80;

    expect(isStunMessage(rtp)).toBe(false);
    expect(isStunMessage(new Uint8Array(4))).toBe(false);
  });
});

describe('TransactionId', () => {
  it('should right-align numbers big-endian', () => {
    expect(TransactionId.fromNumber(123).toString()).toBe('00000000000000000000007b');
    expect(TransactionId.fromNumber(0x0102n).toBytes()).toEqual(
      new Uint8Array([0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0x01, 0x02])
    );
  });

  it('should reject numbers outside 96 bits', () => {
    expect(() => TransactionId.fromNumber(-1)).toThrow(StunConversionError);
    expect(() => TransactionId.fromNumber(1n << 96n)).toThrow(StunConversionError);
  });

  it('should require exactly 12 bytes', () => {
    expect(() => TransactionId.fromBytes(new Uint8Array(11))).toThrow(StunDecodeError);
  });

  it('should copy the bytes it wraps', () => {
    const bytes = new Uint8Array(12).fill(7);
    const id = TransactionId.fromBytes(bytes);
    bytes[0] = 0;

    expect(id.toBytes()[0]).toBe(7);
  });

  it('should compare by value', () => {
    expect(TransactionId.fromNumber(5).equals(TransactionId.fromNumber(5))).toBe(true);
    expect(TransactionId.fromNumber(5).equals(TransactionId.fromNumber(6))).toBe(false);
  });

  it('should generate random 12-byte ids', () => {
    const a = TransactionId.random();
    const b = TransactionId.random();

    expect(a.toBytes().length).toBe(12);
    expect(a.equals(b)).toBe(false);
  });
});

describe('withDeclaredLength', () => {
  it('should substitute the length field without touching the buffer', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 16);
    const original = Uint8Array.from(header);

    const chunks = withDeclaredLength(header, 20, 0x0124);

    expect(chunks.length).toBe(3);
    expect(Array.from(chunks[0])).toEqual([0x00, 0x01]);
    expect(Array.from(chunks[1])).toEqual([0x01, 0x24]);
    expect(chunks[2]).toEqual(header.subarray(4, 20));
    expect(header).toEqual(original);
  });

  it('should stop at the requested end', () => {
    const header = buildHeader(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID, 0);
    const chunks = withDeclaredLength(header, 8, 0);

    expect(chunks[2].length).toBe(4);
  });
});
