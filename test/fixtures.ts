/**
 * Shared test fixtures for STUN codec tests
 */

import {
  MessageBuilder,
  MessageClass,
  Method,
  TransactionId,
} from '../src/index.js';
import type { Attribute } from '../src/index.js';

/** Deterministic transaction id */
export const TEST_TRANSACTION_ID = TransactionId.fromNumber(123);

/** Short-term password used across integrity tests */
export const TEST_PASSWORD = 'abc123';

/**
 * Attribute that writes arbitrary bytes under an arbitrary type
 *
 * Lets tests put malformed values on the wire.
 */
export class RawAttribute implements Attribute {
  constructor(
    readonly type: number,
    private readonly value: Uint8Array
  ) {}

  encodeLength(): number {
    return this.value.length;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.value);
  }
}

/**
 * Starts a Binding request with the test transaction id
 */
export function bindingRequest(): MessageBuilder {
  return new MessageBuilder(MessageClass.Request, Method.Binding, TEST_TRANSACTION_ID);
}

/**
 * Copies bytes with the header length field replaced
 */
export function withLengthField(bytes: Uint8Array, length: number): Uint8Array {
  const copy = Uint8Array.from(bytes);
  copy[2] = (length >> 8) & 0xff;
  copy[3] = length & 0xff;
  return copy;
}

/**
 * Reads the header length field
 */
export function lengthField(bytes: Uint8Array): number {
  return (bytes[2] << 8) | bytes[3];
}
