/**
 * FINGERPRINT attribute (RFC 8489 Section 14.7)
 *
 * FINGERPRINT = CRC-32(message before this attribute) XOR 0x5354554e
 *
 * @category Attributes
 * @packageDocumentation
 */

import Debug from 'debug';
import {
  ATTRIBUTE_HEADER_SIZE,
  ATTRIBUTE_TYPES,
  FINGERPRINT_SIZE,
  FINGERPRINT_XOR,
} from '../constants.js';
import { readU32, u32Bytes } from '../bytes.js';
import { crc32 } from '../crc32.js';
import { StunFingerprintError, StunInvalidDataError } from '../errors.js';
import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import type { AttrSpan } from '../types.js';
import type { Attribute } from './attribute.js';

const debug = Debug('stun-codec:fingerprint');

function computeFingerprint(data: Uint8Array): number {
  return (crc32(data) ^ FINGERPRINT_XOR) >>> 0;
}

/**
 * FINGERPRINT marker attribute
 *
 * Must be the last attribute of a message. Decoding it verifies the
 * checksum; a successful decode carries no value.
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * builder.addAttr(new Fingerprint());
 * // ...
 * Message.parse(bytes).attribute(Fingerprint); // throws StunFingerprintError on mismatch
 * ```
 */
export class Fingerprint implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.FINGERPRINT;

  readonly type = Fingerprint.TYPE;

  /**
   * Verifies the FINGERPRINT at `span`
   *
   * @throws {@link StunInvalidDataError} if the value is not 4 bytes
   * @throws {@link StunFingerprintError} if the checksum does not match
   */
  static decode(_ctx: void, message: Message, span: AttrSpan): Fingerprint {
    const value = message.getValue(span);
    if (value.length !== FINGERPRINT_SIZE) {
      throw new StunInvalidDataError('fingerprint value must be 4 bytes');
    }

    const expected = computeFingerprint(message.buffer.subarray(0, span.begin));
    if (readU32(value, 0) !== expected) {
      debug('fingerprint mismatch in message %s', message.transactionId.toString());
      throw new StunFingerprintError();
    }

    return new Fingerprint();
  }

  encodeLength(): number {
    return FINGERPRINT_SIZE;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    const data = builder.bytes();
    const fingerprint = computeFingerprint(
      data.subarray(0, data.length - ATTRIBUTE_HEADER_SIZE)
    );
    builder.append(u32Bytes(fingerprint));
  }
}
