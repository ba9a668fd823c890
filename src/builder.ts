/**
 * STUN message builder
 *
 * Appends attributes one at a time into a growing buffer. The header
 * length field is kept pointing at the end of the attribute being
 * written, so attributes that hash the message so far (FINGERPRINT,
 * MESSAGE-INTEGRITY) see the length a receiver will see.
 *
 * @category Builder
 * @packageDocumentation
 */

import Debug from 'debug';
import { ATTRIBUTE_HEADER_SIZE, HEADER_SIZE } from './constants.js';
import { ByteBuffer, padded, readU16, toU16 } from './bytes.js';
import { StunEncodeError } from './errors.js';
import { buildHeader, type TransactionId } from './header.js';
import type { Attribute } from './attributes/attribute.js';
import type { MessageClass } from './types.js';

const debug = Debug('stun-codec:builder');

/**
 * Builds an outgoing STUN message
 *
 * @category Builder
 *
 * @example
 * ```typescript
 * const builder = new MessageBuilder(MessageClass.Request, Method.Binding, TransactionId.random());
 * builder.addAttr(new Software('example-agent'));
 * builder.addAttrWith(new MessageIntegrity(), MessageIntegrityKey.shortTerm('abc123'));
 * builder.addAttr(new Fingerprint());
 * const bytes = builder.finish();
 * ```
 */
export class MessageBuilder {
  private readonly buffer = new ByteBuffer();

  constructor(
    readonly msgClass: MessageClass,
    readonly method: number,
    readonly transactionId: TransactionId
  ) {
    this.buffer.append(buildHeader(msgClass, method, transactionId, 0));
  }

  /** Number of bytes written so far, header included */
  get length(): number {
    return this.buffer.length;
  }

  /**
   * View of the bytes written so far
   *
   * The view is invalidated by the next write.
   */
  bytes(): Uint8Array {
    return this.buffer.view();
  }

  /**
   * Overwrites the header's message length field
   *
   * @throws {@link StunConversionError} if `length` exceeds 16 bits
   */
  setDeclaredLength(length: number): void {
    this.buffer.setU16(2, length);
  }

  /**
   * Appends raw bytes, used by attributes to write their value
   */
  append(bytes: Uint8Array): void {
    this.buffer.append(bytes);
  }

  /**
   * Appends an attribute that needs no context
   *
   * @throws {@link StunConversionError} if the value or message is too long
   * @throws {@link StunEncodeError} if the attribute rejects its input
   */
  addAttr(attr: Attribute): void {
    this.addAttrWith(attr, undefined);
  }

  /**
   * Appends an attribute, passing it a context
   *
   * On failure nothing is written: the buffer and the declared length are
   * left as they were before the call.
   *
   * @param attr - Attribute to encode
   * @param ctx - External input the attribute needs (e.g. an integrity key)
   */
  addAttrWith<Ctx>(attr: Attribute<Ctx>, ctx: Ctx): void {
    const valueLength = toU16(attr.encodeLength());
    const start = this.buffer.length;
    const paddedEnd = start + ATTRIBUTE_HEADER_SIZE + padded(valueLength);
    toU16(paddedEnd - HEADER_SIZE);

    const declared = readU16(this.buffer.view(), 2);
    try {
      this.buffer.appendU16(attr.type);
      this.buffer.appendU16(valueLength);
      this.setDeclaredLength(paddedEnd - HEADER_SIZE);

      const valueBegin = this.buffer.length;
      attr.encode(ctx, this);

      const written = this.buffer.length - valueBegin;
      if (written !== valueLength) {
        throw new StunEncodeError(
          `Attribute 0x${attr.type.toString(16).padStart(4, '0')} wrote ${written} bytes, declared ${valueLength}`
        );
      }
    } catch (error) {
      // Leave the builder as it was before the call
      this.buffer.truncate(start);
      this.setDeclaredLength(declared);
      throw error;
    }

    this.buffer.appendZeros(paddedEnd - this.buffer.length);
    this.setDeclaredLength(this.buffer.length - HEADER_SIZE);

    debug('added attribute 0x%s (%d bytes)', attr.type.toString(16), valueLength);
  }

  /**
   * Returns a copy of the finished message
   */
  finish(): Uint8Array {
    this.setDeclaredLength(this.buffer.length - HEADER_SIZE);
    return Uint8Array.from(this.buffer.view());
  }
}
