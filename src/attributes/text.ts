/**
 * UTF-8 text attributes: USERNAME, REALM, NONCE, SOFTWARE
 *
 * @category Attributes
 * @packageDocumentation
 */

import { ATTRIBUTE_TYPES, TEXT_LIMITS } from '../constants.js';
import { StunEncodeError, StunInvalidDataError } from '../errors.js';
import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import type { AttrSpan } from '../types.js';
import type { Attribute } from './attribute.js';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

function decodeText(message: Message, span: AttrSpan, name: string, limit: number): string {
  const value = message.getValue(span);
  if (value.length >= limit) {
    throw new StunInvalidDataError(`${name} must be shorter than ${limit} bytes`);
  }

  try {
    return utf8Decoder.decode(value);
  } catch {
    throw new StunInvalidDataError(`${name} is not valid UTF-8`);
  }
}

function encodeText(value: string, name: string, limit: number): Uint8Array {
  const bytes = utf8Encoder.encode(value);
  if (bytes.length >= limit) {
    throw new StunEncodeError(`${name} must be shorter than ${limit} bytes, got ${bytes.length}`);
  }
  return bytes;
}

/**
 * Shared encoding side of the text attributes
 */
abstract class TextAttribute implements Attribute {
  abstract readonly type: number;

  private readonly bytes: Uint8Array;

  constructor(
    readonly value: string,
    name: string,
    limit: number
  ) {
    this.bytes = encodeText(value, name, limit);
  }

  encodeLength(): number {
    return this.bytes.length;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.bytes);
  }
}

/**
 * USERNAME: user name and password identifier
 *
 * @category Attributes
 */
export class Username extends TextAttribute {
  static readonly TYPE = ATTRIBUTE_TYPES.USERNAME;

  readonly type = Username.TYPE;

  /**
   * @throws {@link StunEncodeError} if the value is 513 bytes or longer
   */
  constructor(value: string) {
    super(value, 'USERNAME', TEXT_LIMITS.USERNAME);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): Username {
    return new Username(decodeText(message, span, 'USERNAME', TEXT_LIMITS.USERNAME));
  }
}

/**
 * REALM: long-term credential realm
 *
 * @category Attributes
 */
export class Realm extends TextAttribute {
  static readonly TYPE = ATTRIBUTE_TYPES.REALM;

  readonly type = Realm.TYPE;

  constructor(value: string) {
    super(value, 'REALM', TEXT_LIMITS.REALM);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): Realm {
    return new Realm(decodeText(message, span, 'REALM', TEXT_LIMITS.REALM));
  }
}

/**
 * NONCE: server-issued nonce for long-term credentials
 *
 * @category Attributes
 */
export class Nonce extends TextAttribute {
  static readonly TYPE = ATTRIBUTE_TYPES.NONCE;

  readonly type = Nonce.TYPE;

  constructor(value: string) {
    super(value, 'NONCE', TEXT_LIMITS.NONCE);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): Nonce {
    return new Nonce(decodeText(message, span, 'NONCE', TEXT_LIMITS.NONCE));
  }
}

/**
 * SOFTWARE: textual description of the sending agent
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * builder.addAttr(new Software('example-agent 1.0'));
 * msg.attribute(Software)?.value; // 'example-agent 1.0'
 * ```
 */
export class Software extends TextAttribute {
  static readonly TYPE = ATTRIBUTE_TYPES.SOFTWARE;

  readonly type = Software.TYPE;

  constructor(value: string) {
    super(value, 'SOFTWARE', TEXT_LIMITS.SOFTWARE);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): Software {
    return new Software(decodeText(message, span, 'SOFTWARE', TEXT_LIMITS.SOFTWARE));
  }
}
