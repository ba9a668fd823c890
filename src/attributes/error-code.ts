/**
 * ERROR-CODE and UNKNOWN-ATTRIBUTES attributes
 *
 * @category Attributes
 * @packageDocumentation
 */

import { ATTRIBUTE_TYPES, TEXT_LIMITS } from '../constants.js';
import { readU16, writeU16 } from '../bytes.js';
import { StunEncodeError, StunInvalidDataError } from '../errors.js';
import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import type { AttrSpan } from '../types.js';
import type { Attribute } from './attribute.js';

/**
 * Well-known error codes (RFC 8489 Section 14.8)
 *
 * @category Attributes
 */
export const ERROR_CODES = {
  TRY_ALTERNATE: 300,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  UNKNOWN_ATTRIBUTE: 420,
  STALE_NONCE: 438,
  SERVER_ERROR: 500,
} as const;

/**
 * ERROR-CODE: numeric code (300-699) and reason phrase
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |           Reserved, should be 0         |Class|     Number    |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |      Reason Phrase (variable)                                ..
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * builder.addAttr(new ErrorCode(ERROR_CODES.UNAUTHORIZED, 'Unauthorized'));
 * ```
 */
export class ErrorCode implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.ERROR_CODE;

  readonly type = ErrorCode.TYPE;

  private readonly reasonBytes: Uint8Array;

  /**
   * @throws {@link StunEncodeError} if the code is outside 300-699 or the
   * reason is 763 bytes or longer
   */
  constructor(
    readonly code: number,
    readonly reason: string
  ) {
    if (!Number.isInteger(code) || code < 300 || code > 699) {
      throw new StunEncodeError(`Invalid error code: ${code}`);
    }

    this.reasonBytes = new TextEncoder().encode(reason);
    if (this.reasonBytes.length >= TEXT_LIMITS.REASON_PHRASE) {
      throw new StunEncodeError(
        `Reason phrase must be shorter than ${TEXT_LIMITS.REASON_PHRASE} bytes`
      );
    }
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): ErrorCode {
    const value = message.getValue(span);
    if (value.length < 4) {
      throw new StunInvalidDataError('ERROR-CODE value too short');
    }

    const errorClass = value[2] & 0x07;
    const number = value[3];
    if (errorClass < 3 || errorClass > 6 || number > 99) {
      throw new StunInvalidDataError(`Invalid error code: class ${errorClass}, number ${number}`);
    }

    let reason: string;
    try {
      reason = new TextDecoder('utf-8', { fatal: true }).decode(value.subarray(4));
    } catch {
      throw new StunInvalidDataError('ERROR-CODE reason is not valid UTF-8');
    }

    if (value.length - 4 >= TEXT_LIMITS.REASON_PHRASE) {
      throw new StunInvalidDataError(
        `Reason phrase must be shorter than ${TEXT_LIMITS.REASON_PHRASE} bytes`
      );
    }

    return new ErrorCode(errorClass * 100 + number, reason);
  }

  encodeLength(): number {
    return 4 + this.reasonBytes.length;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    const value = new Uint8Array(4 + this.reasonBytes.length);
    value[2] = Math.floor(this.code / 100);
    value[3] = this.code % 100;
    value.set(this.reasonBytes, 4);
    builder.append(value);
  }
}

/**
 * UNKNOWN-ATTRIBUTES: attribute types a 420 response did not understand
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * const unknown = request.unknownComprehensionRequired([Username.TYPE, MessageIntegrity.TYPE]);
 * if (unknown.length > 0) {
 *   response.addAttr(new ErrorCode(ERROR_CODES.UNKNOWN_ATTRIBUTE, 'Unknown Attribute'));
 *   response.addAttr(new UnknownAttributes(unknown));
 * }
 * ```
 */
export class UnknownAttributes implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.UNKNOWN_ATTRIBUTES;

  readonly type = UnknownAttributes.TYPE;

  constructor(readonly types: readonly number[]) {
    for (const t of types) {
      if (!Number.isInteger(t) || t < 0 || t > 0xffff) {
        throw new StunEncodeError(`Invalid attribute type: ${t}`);
      }
    }
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): UnknownAttributes {
    const value = message.getValue(span);
    if (value.length % 2 !== 0) {
      throw new StunInvalidDataError('UNKNOWN-ATTRIBUTES length must be even');
    }

    const types: number[] = [];
    for (let offset = 0; offset < value.length; offset += 2) {
      types.push(readU16(value, offset));
    }
    return new UnknownAttributes(types);
  }

  encodeLength(): number {
    return this.types.length * 2;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    const value = new Uint8Array(this.types.length * 2);
    this.types.forEach((t, i) => writeU16(value, i * 2, t));
    builder.append(value);
  }
}
