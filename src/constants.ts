/**
 * STUN Protocol Constants (RFC 8489)
 */

/** Magic cookie carried in every STUN header */
export const MAGIC_COOKIE = 0x2112a442;

/** Size of the fixed STUN header in bytes */
export const HEADER_SIZE = 20;

/** Size of an attribute's type + length prefix */
export const ATTRIBUTE_HEADER_SIZE = 4;

/** Size of a transaction id (96 bits) */
export const TRANSACTION_ID_SIZE = 12;

/** Value XORed into the CRC-32 of a FINGERPRINT attribute ("STUN" in ASCII) */
export const FINGERPRINT_XOR = 0x5354554e;

/** Size of a FINGERPRINT value */
export const FINGERPRINT_SIZE = 4;

/** HMAC-SHA1 output size */
export const SHA1_DIGEST_SIZE = 20;

/** HMAC-SHA256 output size */
export const SHA256_DIGEST_SIZE = 32;

/** Default upper bound on attributes scanned by Message.parse */
export const DEFAULT_MAX_ATTRIBUTES = 64;

/** Attribute type codes */
export const ATTRIBUTE_TYPES = {
  MAPPED_ADDRESS: 0x0001,
  USERNAME: 0x0006,
  MESSAGE_INTEGRITY: 0x0008,
  ERROR_CODE: 0x0009,
  UNKNOWN_ATTRIBUTES: 0x000a,
  REALM: 0x0014,
  NONCE: 0x0015,
  MESSAGE_INTEGRITY_SHA256: 0x001c,
  XOR_MAPPED_ADDRESS: 0x0020,
  PRIORITY: 0x0024,
  USE_CANDIDATE: 0x0025,
  SOFTWARE: 0x8022,
  ALTERNATE_SERVER: 0x8023,
  FINGERPRINT: 0x8028,
  ICE_CONTROLLED: 0x8029,
  ICE_CONTROLLING: 0x802a,
} as const;

/**
 * Maximum UTF-8 byte lengths of text attributes
 *
 * RFC 8489 counts these as "less than" limits, so a value must be
 * strictly shorter.
 */
export const TEXT_LIMITS = {
  USERNAME: 513,
  REALM: 763,
  NONCE: 763,
  SOFTWARE: 763,
  REASON_PHRASE: 763,
} as const;
