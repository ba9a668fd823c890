/**
 * Parsed STUN message
 *
 * Parsing validates the header and walks the attribute list once,
 * recording an {@link AttrSpan} per occurrence. Attribute values are
 * decoded lazily, each kind re-reading its own span.
 *
 * @category Message
 * @packageDocumentation
 */

import Debug from 'debug';
import {
  ATTRIBUTE_HEADER_SIZE,
  DEFAULT_MAX_ATTRIBUTES,
  HEADER_SIZE,
} from './constants.js';
import { padded, readU16 } from './bytes.js';
import { StunDecodeError } from './errors.js';
import { parseHeader, type StunHeader, type TransactionId } from './header.js';
import type { AttributeKind } from './attributes/attribute.js';
import type { AttrSpan, MessageClass, ParseOptions } from './types.js';

const debug = Debug('stun-codec:message');

/**
 * A received STUN message
 *
 * @category Message
 *
 * @example
 * ```typescript
 * const msg = Message.parse(datagram);
 * const key = MessageIntegrityKey.shortTerm('abc123');
 *
 * msg.attributeWith(MessageIntegrity, key); // throws StunIntegrityError on mismatch
 * const software = msg.attribute(Software)?.value;
 * ```
 */
export class Message {
  private constructor(
    /** Message bytes, truncated to the header's declared length */
    readonly buffer: Uint8Array,
    private readonly header: StunHeader,
    /** Attribute occurrences in wire order */
    readonly spans: readonly AttrSpan[]
  ) {}

  /**
   * Parses a STUN message
   *
   * Bytes after the declared length are ignored. The input buffer is
   * copied, so the caller may reuse it.
   *
   * @param data - Received bytes
   * @param options - Parse limits
   * @throws {@link StunDecodeError} if the header is invalid, the buffer is
   * shorter than the declared length, or an attribute runs past the end
   */
  static parse(data: Uint8Array, options: ParseOptions = {}): Message {
    const maxAttributes = options.maxAttributes ?? DEFAULT_MAX_ATTRIBUTES;
    const header = parseHeader(data);

    const end = HEADER_SIZE + header.length;
    if (data.length < end) {
      throw new StunDecodeError(
        `Message truncated: header declares ${end} bytes, got ${data.length}`
      );
    }

    const buffer = Uint8Array.from(data.subarray(0, end));
    const spans: AttrSpan[] = [];
    let offset = HEADER_SIZE;

    while (offset < end) {
      if (spans.length >= maxAttributes) {
        throw new StunDecodeError(`Too many attributes: limit is ${maxAttributes}`);
      }
      if (offset + ATTRIBUTE_HEADER_SIZE > end) {
        throw new StunDecodeError('Unexpected end of message while reading attribute header');
      }

      const type = readU16(buffer, offset);
      const valueLength = readU16(buffer, offset + 2);
      const valueBegin = offset + ATTRIBUTE_HEADER_SIZE;
      const valueEnd = valueBegin + valueLength;
      const paddingEnd = valueBegin + padded(valueLength);

      if (paddingEnd > end) {
        throw new StunDecodeError(
          `Attribute 0x${type.toString(16).padStart(4, '0')} truncated: needs ${paddingEnd - valueBegin} bytes, ${end - valueBegin} left`
        );
      }

      spans.push({ type, begin: offset, valueBegin, valueEnd, paddingEnd });
      offset = paddingEnd;
    }

    debug(
      'parsed message %s with %d attributes',
      header.transactionId.toString(),
      spans.length
    );

    return new Message(buffer, header, spans);
  }

  get class(): MessageClass {
    return this.header.class;
  }

  get method(): number {
    return this.header.method;
  }

  get transactionId(): TransactionId {
    return this.header.transactionId;
  }

  /** Declared length from the header (bytes after the header) */
  get length(): number {
    return this.header.length;
  }

  /**
   * Value bytes of a span
   */
  getValue(span: AttrSpan): Uint8Array {
    return this.buffer.subarray(span.valueBegin, span.valueEnd);
  }

  /**
   * First span with the given type
   */
  findSpan(type: number): AttrSpan | undefined {
    return this.spans.find((span) => span.type === type);
  }

  hasAttribute(type: number): boolean {
    return this.findSpan(type) !== undefined;
  }

  /**
   * Decodes the first attribute of a kind that needs no context
   *
   * @returns The decoded attribute, or undefined if the message has none
   * @throws {@link StunInvalidDataError} if the attribute is present but invalid
   */
  attribute<T>(kind: AttributeKind<T>): T | undefined {
    return this.attributeWith(kind, undefined);
  }

  /**
   * Decodes the first attribute of a kind, passing it a context
   *
   * @returns The decoded attribute, or undefined if the message has none
   * @throws {@link StunInvalidDataError} if the attribute is present but
   * invalid or fails verification
   */
  attributeWith<T, Ctx>(kind: AttributeKind<T, Ctx>, ctx: Ctx): T | undefined {
    const span = this.findSpan(kind.TYPE);
    return span === undefined ? undefined : kind.decode(ctx, this, span);
  }

  /**
   * Decodes every occurrence of a kind that needs no context
   */
  attributes<T>(kind: AttributeKind<T>): T[] {
    return this.attributesWith(kind, undefined);
  }

  /**
   * Decodes every occurrence of a kind, in wire order
   */
  attributesWith<T, Ctx>(kind: AttributeKind<T, Ctx>, ctx: Ctx): T[] {
    return this.spans
      .filter((span) => span.type === kind.TYPE)
      .map((span) => kind.decode(ctx, this, span));
  }

  /**
   * Lists comprehension-required attribute types the caller does not know
   *
   * Types below 0x8000 must be understood by the receiver; a request that
   * carries unknown ones is answered with a 420 error and an
   * UNKNOWN-ATTRIBUTES attribute listing them.
   *
   * @param known - Attribute types the caller handles
   * @returns Unknown comprehension-required types, without duplicates
   */
  unknownComprehensionRequired(known: Iterable<number>): number[] {
    const knownSet = new Set(known);
    const unknown = new Set<number>();
    for (const span of this.spans) {
      if (span.type < 0x8000 && !knownSet.has(span.type)) {
        unknown.add(span.type);
      }
    }
    return [...unknown];
  }
}
