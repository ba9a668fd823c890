/**
 * Generic attribute contract
 *
 * Every attribute is a class whose instances know how to encode
 * themselves ({@link Attribute}) and whose static side knows how to decode
 * a span of a parsed message ({@link AttributeKind}). `Ctx` is the
 * external input the codec needs beyond the message bytes: `void` for
 * plain attributes, a {@link MessageIntegrityKey} for the integrity
 * attributes.
 *
 * @category Attributes
 * @packageDocumentation
 */

import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import type { AttrSpan } from '../types.js';

/**
 * Encoding side of an attribute
 *
 * @category Attributes
 */
export interface Attribute<Ctx = void> {
  /** 16-bit attribute type code */
  readonly type: number;

  /** Length of the value in bytes, before padding */
  encodeLength(): number;

  /**
   * Appends the value to the builder
   *
   * When this is called the builder's buffer ends right after the
   * attribute's 4-byte header and the declared length already covers the
   * attribute. Exactly `encodeLength()` bytes must be appended; padding is
   * written by the builder afterwards.
   */
  encode(ctx: Ctx, builder: MessageBuilder): void;
}

/**
 * Decoding side of an attribute, implemented by the class itself
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * const software = msg.attribute(Software);           // AttributeKind<Software, void>
 * msg.attributeWith(MessageIntegrity, key);           // AttributeKind<MessageIntegrity, MessageIntegrityKey>
 * ```
 */
export interface AttributeKind<T, Ctx = void> {
  /** 16-bit attribute type code */
  readonly TYPE: number;

  decode(ctx: Ctx, message: Message, span: AttrSpan): T;
}
