/**
 * STUN TypeScript Type Definitions
 */

/**
 * Message class (two bits interleaved into the message type)
 */
export enum MessageClass {
  Request = 0b00,
  Indication = 0b01,
  Success = 0b10,
  Error = 0b11,
}

/**
 * Message methods defined by RFC 8489
 *
 * Methods are 12-bit values; anything outside this enum is carried as a
 * plain number.
 */
export enum Method {
  Binding = 0x001,
}

/**
 * Address family used by the address attributes
 */
export enum AddressFamily {
  IPv4 = 0x01,
  IPv6 = 0x02,
}

/**
 * Location of one attribute occurrence inside a parsed message
 *
 * All offsets are absolute positions in the message buffer.
 */
export interface AttrSpan {
  /** Attribute type code */
  type: number;

  /** Offset of the 4-byte type + length header */
  begin: number;

  /** Offset of the first value byte */
  valueBegin: number;

  /** End of the value (exclusive), per the attribute's length field */
  valueEnd: number;

  /** End of the value rounded up to a 4-byte boundary */
  paddingEnd: number;
}

/**
 * Transport address carried by MAPPED-ADDRESS and friends
 */
export interface SocketAddress {
  /** Dotted IPv4 or colon-separated IPv6 address */
  address: string;

  /** Port number (0-65535) */
  port: number;
}

/**
 * Options for Message.parse
 */
export interface ParseOptions {
  /** Maximum number of attributes to scan (default: 64) */
  maxAttributes?: number;
}
