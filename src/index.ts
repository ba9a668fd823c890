/**
 * stun-codec - STUN message codec (RFC 8489)
 *
 * Parses and builds STUN messages attribute by attribute, and computes
 * and verifies FINGERPRINT and MESSAGE-INTEGRITY over partial buffers.
 *
 * @packageDocumentation
 */

// Messages
export { Message } from './message.js';
export { MessageBuilder } from './builder.js';

// Header
export {
  TransactionId,
  parseHeader,
  buildHeader,
  encodeMessageType,
  decodeMessageType,
  isStunMessage,
  withDeclaredLength,
} from './header.js';
export type { StunHeader } from './header.js';

// Attributes
export { Fingerprint } from './attributes/fingerprint.js';
export {
  MessageIntegrity,
  MessageIntegritySha256,
  MessageIntegrityKey,
} from './attributes/integrity.js';
export { Username, Realm, Nonce, Software } from './attributes/text.js';
export {
  MappedAddress,
  XorMappedAddress,
  AlternateServer,
} from './attributes/address.js';
export {
  ErrorCode,
  UnknownAttributes,
  ERROR_CODES,
} from './attributes/error-code.js';
export {
  Priority,
  UseCandidate,
  IceControlled,
  IceControlling,
} from './attributes/ice.js';
export type { Attribute, AttributeKind } from './attributes/attribute.js';
export type { DigestAlgorithm } from './attributes/integrity.js';

// Checksum
export { crc32, updateCrc32 } from './crc32.js';

// Error types
export {
  StunError,
  StunDecodeError,
  StunEncodeError,
  StunInvalidDataError,
  StunIntegrityError,
  StunFingerprintError,
  StunConversionError,
} from './errors.js';

// Types
export { MessageClass, Method, AddressFamily } from './types.js';
export type { AttrSpan, SocketAddress, ParseOptions } from './types.js';

// Constants
export {
  MAGIC_COOKIE,
  HEADER_SIZE,
  ATTRIBUTE_HEADER_SIZE,
  TRANSACTION_ID_SIZE,
  FINGERPRINT_XOR,
  FINGERPRINT_SIZE,
  SHA1_DIGEST_SIZE,
  SHA256_DIGEST_SIZE,
  DEFAULT_MAX_ATTRIBUTES,
  ATTRIBUTE_TYPES,
  TEXT_LIMITS,
} from './constants.js';
