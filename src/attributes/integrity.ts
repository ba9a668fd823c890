/**
 * MESSAGE-INTEGRITY (HMAC-SHA1) and MESSAGE-INTEGRITY-SHA256 attributes
 * (RFC 8489 Sections 14.5 and 14.6), and the keys they are computed with.
 *
 * The HMAC input is the message up to, but excluding, the integrity
 * attribute, with the header length field adjusted to point at the end
 * of the integrity attribute.
 *
 * @category Attributes
 * @packageDocumentation
 */

import { createHash, createHmac, timingSafeEqual, type Hmac } from 'node:crypto';
import Debug from 'debug';
import {
  ATTRIBUTE_HEADER_SIZE,
  ATTRIBUTE_TYPES,
  HEADER_SIZE,
  SHA1_DIGEST_SIZE,
  SHA256_DIGEST_SIZE,
} from '../constants.js';
import { StunIntegrityError } from '../errors.js';
import { withDeclaredLength } from '../header.js';
import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import type { AttrSpan } from '../types.js';
import type { Attribute } from './attribute.js';

const debug = Debug('stun-codec:integrity');

/**
 * Key material for the integrity attributes
 *
 * Which credential scheme produced the key is not recorded: the HMAC
 * only sees the bytes.
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * const ice = MessageIntegrityKey.shortTerm(remotePwd);
 * const turn = MessageIntegrityKey.longTermMd5('alice', 'example.org', 'test-secret');
 * ```
 */
export class MessageIntegrityKey {
  private constructor(private readonly key: Uint8Array) {}

  /**
   * Short-term credential: the UTF-8 bytes of the password
   */
  static shortTerm(password: string): MessageIntegrityKey {
    return new MessageIntegrityKey(new TextEncoder().encode(password));
  }

  /**
   * Long-term credential: MD5(username ":" realm ":" password), 16 bytes
   */
  static longTermMd5(
    username: string,
    realm: string,
    password: string
  ): MessageIntegrityKey {
    const digest = createHash('md5')
      .update(`${username}:${realm}:${password}`)
      .digest();
    return new MessageIntegrityKey(new Uint8Array(digest));
  }

  /**
   * Long-term credential: SHA-256(username ":" realm ":" password), 32 bytes
   */
  static longTermSha256(
    username: string,
    realm: string,
    password: string
  ): MessageIntegrityKey {
    const digest = createHash('sha256')
      .update(`${username}:${realm}:${password}`)
      .digest();
    return new MessageIntegrityKey(new Uint8Array(digest));
  }

  /**
   * Pre-shared or externally derived key, used as-is (copied)
   */
  static raw(bytes: Uint8Array): MessageIntegrityKey {
    return new MessageIntegrityKey(Uint8Array.from(bytes));
  }

  /** Copy of the key bytes */
  get bytes(): Uint8Array {
    return Uint8Array.from(this.key);
  }

  get length(): number {
    return this.key.length;
  }

  /**
   * Creates an HMAC keyed with this key
   *
   * Any key length is accepted, the empty key included.
   */
  createHmac(algorithm: DigestAlgorithm): Hmac {
    return createHmac(algorithm.name, this.key);
  }
}

/**
 * Hash underlying an integrity attribute
 *
 * @category Attributes
 */
export interface DigestAlgorithm {
  name: 'sha1' | 'sha256';
  size: number;
}

const SHA1: DigestAlgorithm = { name: 'sha1', size: SHA1_DIGEST_SIZE };
const SHA256: DigestAlgorithm = { name: 'sha256', size: SHA256_DIGEST_SIZE };

function integrityEncode(
  algorithm: DigestAlgorithm,
  key: MessageIntegrityKey,
  builder: MessageBuilder
): void {
  const hmac = key.createHmac(algorithm);

  // The attribute header is already in the buffer
  builder.setDeclaredLength(builder.length + algorithm.size - HEADER_SIZE);

  const data = builder.bytes();
  hmac.update(data.subarray(0, data.length - ATTRIBUTE_HEADER_SIZE));
  builder.append(new Uint8Array(hmac.digest()));
}

function integrityDecode(
  algorithm: DigestAlgorithm,
  key: MessageIntegrityKey,
  message: Message,
  span: AttrSpan
): void {
  const received = message.getValue(span);

  if (received.length !== algorithm.size) {
    debug(
      'integrity value of %d bytes, expected %d',
      received.length,
      algorithm.size
    );
    throw new StunIntegrityError();
  }

  const hmac = key.createHmac(algorithm);
  const chunks = withDeclaredLength(
    message.buffer,
    span.begin,
    span.paddingEnd - HEADER_SIZE
  );
  for (const chunk of chunks) {
    hmac.update(chunk);
  }

  if (!timingSafeEqual(hmac.digest(), received)) {
    debug(
      '%s integrity mismatch in message %s',
      algorithm.name,
      message.transactionId.toString()
    );
    throw new StunIntegrityError();
  }
}

/**
 * MESSAGE-INTEGRITY: HMAC-SHA1, 20 bytes
 *
 * Must come before MESSAGE-INTEGRITY-SHA256 and FINGERPRINT.
 *
 * @category Attributes
 */
export class MessageIntegrity implements Attribute<MessageIntegrityKey> {
  static readonly TYPE = ATTRIBUTE_TYPES.MESSAGE_INTEGRITY;

  readonly type = MessageIntegrity.TYPE;

  /**
   * Verifies the MESSAGE-INTEGRITY at `span`
   *
   * @throws {@link StunIntegrityError} if the digest does not verify
   */
  static decode(
    key: MessageIntegrityKey,
    message: Message,
    span: AttrSpan
  ): MessageIntegrity {
    integrityDecode(SHA1, key, message, span);
    return new MessageIntegrity();
  }

  encodeLength(): number {
    return SHA1.size;
  }

  encode(key: MessageIntegrityKey, builder: MessageBuilder): void {
    integrityEncode(SHA1, key, builder);
  }
}

/**
 * MESSAGE-INTEGRITY-SHA256: HMAC-SHA256, full 32 bytes
 *
 * Must come after MESSAGE-INTEGRITY (if any) and before FINGERPRINT.
 *
 * @category Attributes
 */
export class MessageIntegritySha256 implements Attribute<MessageIntegrityKey> {
  static readonly TYPE = ATTRIBUTE_TYPES.MESSAGE_INTEGRITY_SHA256;

  readonly type = MessageIntegritySha256.TYPE;

  /**
   * Verifies the MESSAGE-INTEGRITY-SHA256 at `span`
   *
   * @throws {@link StunIntegrityError} if the digest does not verify
   */
  static decode(
    key: MessageIntegrityKey,
    message: Message,
    span: AttrSpan
  ): MessageIntegritySha256 {
    integrityDecode(SHA256, key, message, span);
    return new MessageIntegritySha256();
  }

  encodeLength(): number {
    return SHA256.size;
  }

  encode(key: MessageIntegrityKey, builder: MessageBuilder): void {
    integrityEncode(SHA256, key, builder);
  }
}
