/**
 * ICE attributes carried in connectivity checks (RFC 8445 Section 16.1)
 *
 * @category Attributes
 * @packageDocumentation
 */

import { ATTRIBUTE_TYPES } from '../constants.js';
import { readU32, u32Bytes } from '../bytes.js';
import { StunConversionError, StunInvalidDataError } from '../errors.js';
import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import type { AttrSpan } from '../types.js';
import type { Attribute } from './attribute.js';

/**
 * PRIORITY: priority of the peer-reflexive candidate the check would create
 *
 * @category Attributes
 */
export class Priority implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.PRIORITY;

  readonly type = Priority.TYPE;

  private readonly bytes: Uint8Array;

  /**
   * @throws {@link StunConversionError} if `value` does not fit 32 bits
   */
  constructor(readonly value: number) {
    this.bytes = u32Bytes(value);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): Priority {
    const value = message.getValue(span);
    if (value.length !== 4) {
      throw new StunInvalidDataError('PRIORITY value must be 4 bytes');
    }
    return new Priority(readU32(value, 0));
  }

  encodeLength(): number {
    return 4;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.bytes);
  }
}

/**
 * USE-CANDIDATE: flag with an empty value
 *
 * @category Attributes
 */
export class UseCandidate implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.USE_CANDIDATE;

  readonly type = UseCandidate.TYPE;

  static decode(_ctx: void, message: Message, span: AttrSpan): UseCandidate {
    if (message.getValue(span).length !== 0) {
      throw new StunInvalidDataError('USE-CANDIDATE value must be empty');
    }
    return new UseCandidate();
  }

  encodeLength(): number {
    return 0;
  }

  encode(): void {
    // no value
  }
}

function decodeTieBreaker(message: Message, span: AttrSpan, name: string): bigint {
  const value = message.getValue(span);
  if (value.length !== 8) {
    throw new StunInvalidDataError(`${name} value must be 8 bytes`);
  }
  return new DataView(value.buffer, value.byteOffset, 8).getBigUint64(0);
}

function encodeTieBreaker(tieBreaker: bigint): Uint8Array {
  if (tieBreaker < 0n || tieBreaker > 0xffffffffffffffffn) {
    throw new StunConversionError(tieBreaker, 64);
  }
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, tieBreaker);
  return bytes;
}

/**
 * ICE-CONTROLLED: sender is in the controlled role; carries its tie-breaker
 *
 * @category Attributes
 */
export class IceControlled implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.ICE_CONTROLLED;

  readonly type = IceControlled.TYPE;

  private readonly bytes: Uint8Array;

  constructor(readonly tieBreaker: bigint) {
    this.bytes = encodeTieBreaker(tieBreaker);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): IceControlled {
    return new IceControlled(decodeTieBreaker(message, span, 'ICE-CONTROLLED'));
  }

  encodeLength(): number {
    return 8;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.bytes);
  }
}

/**
 * ICE-CONTROLLING: sender is in the controlling role; carries its tie-breaker
 *
 * @category Attributes
 */
export class IceControlling implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.ICE_CONTROLLING;

  readonly type = IceControlling.TYPE;

  private readonly bytes: Uint8Array;

  constructor(readonly tieBreaker: bigint) {
    this.bytes = encodeTieBreaker(tieBreaker);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): IceControlling {
    return new IceControlling(decodeTieBreaker(message, span, 'ICE-CONTROLLING'));
  }

  encodeLength(): number {
    return 8;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.bytes);
  }
}
