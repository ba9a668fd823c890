/**
 * STUN Error Classes
 *
 * Provides a hierarchy of error types for programmatic error handling.
 *
 * @category Errors
 * @packageDocumentation
 */

/**
 * Base error class for all STUN codec errors
 *
 * @category Errors
 *
 * @example
 * ```typescript
 * try {
 *   const msg = Message.parse(datagram);
 * } catch (error) {
 *   if (error instanceof StunError) {
 *     console.log('Dropping datagram:', error.message);
 *   }
 * }
 * ```
 */
export class StunError extends Error {
  override name = 'StunError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when received bytes are not a well-formed STUN message
 *
 * Covers the header (length, magic cookie, leading bits) and the
 * attribute framing (truncated attribute, padding past the end).
 *
 * @category Errors
 */
export class StunDecodeError extends StunError {
  override name = 'StunDecodeError';
}

/**
 * Error thrown when an attribute or message cannot be encoded
 *
 * @category Errors
 *
 * @example
 * ```typescript
 * try {
 *   builder.addAttr(new XorMappedAddress({ address: '300.1.1.1', port: 3478 }));
 * } catch (error) {
 *   if (error instanceof StunEncodeError) {
 *     console.log('Invalid input for encoding:', error.message);
 *   }
 * }
 * ```
 */
export class StunEncodeError extends StunError {
  override name = 'StunEncodeError';
}

/**
 * Error thrown when an attribute value is invalid
 *
 * @category Errors
 */
export class StunInvalidDataError extends StunError {
  override name = 'StunInvalidDataError';

  /**
   * @param reason - Short description of what was wrong with the data
   */
  constructor(public readonly reason: string) {
    super(reason);
  }
}

/**
 * Error thrown when MESSAGE-INTEGRITY or MESSAGE-INTEGRITY-SHA256
 * does not verify
 *
 * A stored digest of the wrong length is reported the same way.
 *
 * @category Errors
 *
 * @example
 * ```typescript
 * try {
 *   msg.attributeWith(MessageIntegrity, key);
 * } catch (error) {
 *   if (error instanceof StunIntegrityError) {
 *     // reply with 401 Unauthorized
 *   }
 * }
 * ```
 */
export class StunIntegrityError extends StunInvalidDataError {
  override name = 'StunIntegrityError';

  constructor() {
    super('failed to verify message integrity');
  }
}

/**
 * Error thrown when the FINGERPRINT checksum does not match
 *
 * @category Errors
 */
export class StunFingerprintError extends StunInvalidDataError {
  override name = 'StunFingerprintError';

  constructor() {
    super('failed to verify message fingerprint');
  }
}

/**
 * Error thrown when a number does not fit the field it is written to
 *
 * @category Errors
 */
export class StunConversionError extends StunError {
  override name = 'StunConversionError';

  /**
   * @param value - The value that was out of range
   * @param bits - Width of the target field
   */
  constructor(
    public readonly value: number | bigint,
    public readonly bits: number
  ) {
    super(`Value ${value} does not fit in ${bits} bits`);
  }
}
