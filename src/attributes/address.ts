/**
 * Address attributes: MAPPED-ADDRESS, XOR-MAPPED-ADDRESS, ALTERNATE-SERVER
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |0 0 0 0 0 0 0 0|    Family     |         (X-)Port              |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                 (X-)Address (32 bits or 128 bits)             |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * @category Attributes
 * @packageDocumentation
 */

import { ATTRIBUTE_TYPES, MAGIC_COOKIE } from '../constants.js';
import { readU16, u32Bytes, writeU16 } from '../bytes.js';
import { StunEncodeError, StunInvalidDataError } from '../errors.js';
import { formatIPv4, formatIPv6, isIPv6, parseIPv4, parseIPv6 } from '../ip.js';
import type { TransactionId } from '../header.js';
import type { MessageBuilder } from '../builder.js';
import type { Message } from '../message.js';
import { AddressFamily, type AttrSpan, type SocketAddress } from '../types.js';
import type { Attribute } from './attribute.js';

/**
 * Encodes family + port + address into an attribute value
 */
function encodeAddress(address: SocketAddress): Uint8Array {
  const { port } = address;
  if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
    throw new StunEncodeError(`Invalid port: ${port}`);
  }

  const v6 = isIPv6(address.address);
  const addressBytes = v6 ? parseIPv6(address.address) : parseIPv4(address.address);

  const value = new Uint8Array(4 + addressBytes.length);
  value[1] = v6 ? AddressFamily.IPv6 : AddressFamily.IPv4;
  writeU16(value, 2, port);
  value.set(addressBytes, 4);
  return value;
}

/**
 * Decodes an attribute value into family + port + address bytes
 */
function decodeAddress(
  value: Uint8Array,
  name: string
): { family: AddressFamily; port: number; addressBytes: Uint8Array } {
  if (value.length < 4) {
    throw new StunInvalidDataError(`${name} value too short`);
  }

  const family = value[1];
  const port = readU16(value, 2);

  switch (family) {
    case AddressFamily.IPv4:
      if (value.length !== 8) {
        throw new StunInvalidDataError(`${name} IPv4 value must be 8 bytes`);
      }
      return { family: AddressFamily.IPv4, port, addressBytes: value.slice(4) };

    case AddressFamily.IPv6:
      if (value.length !== 20) {
        throw new StunInvalidDataError(`${name} IPv6 value must be 20 bytes`);
      }
      return { family: AddressFamily.IPv6, port, addressBytes: value.slice(4) };

    default:
      throw new StunInvalidDataError(`${name} has unknown address family ${family}`);
  }
}

function formatAddress(family: AddressFamily, bytes: Uint8Array): string {
  return family === AddressFamily.IPv6 ? formatIPv6(bytes) : formatIPv4(bytes);
}

/**
 * Applies the XOR-MAPPED-ADDRESS mask in place
 *
 * The port is XORed with the top 16 bits of the magic cookie; the
 * address with the cookie followed by the transaction id.
 */
function xorAddressValue(value: Uint8Array, transactionId: TransactionId): void {
  const mask = new Uint8Array(16);
  mask.set(u32Bytes(MAGIC_COOKIE), 0);
  mask.set(transactionId.toBytes(), 4);

  value[2] ^= mask[0];
  value[3] ^= mask[1];
  for (let i = 4; i < Math.min(value.length, 20); i++) {
    value[i] ^= mask[i - 4];
  }
}

/**
 * MAPPED-ADDRESS: reflexive transport address, sent in the clear
 *
 * @category Attributes
 */
export class MappedAddress implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.MAPPED_ADDRESS;

  readonly type = MappedAddress.TYPE;

  private readonly value: Uint8Array;

  /**
   * @throws {@link StunEncodeError} if the address or port is invalid
   */
  constructor(readonly address: SocketAddress) {
    this.value = encodeAddress(address);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): MappedAddress {
    const { family, port, addressBytes } = decodeAddress(message.getValue(span), 'MAPPED-ADDRESS');
    return new MappedAddress({ address: formatAddress(family, addressBytes), port });
  }

  encodeLength(): number {
    return this.value.length;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.value);
  }
}

/**
 * ALTERNATE-SERVER: server to retry against, same layout as MAPPED-ADDRESS
 *
 * @category Attributes
 */
export class AlternateServer implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.ALTERNATE_SERVER;

  readonly type = AlternateServer.TYPE;

  private readonly value: Uint8Array;

  constructor(readonly address: SocketAddress) {
    this.value = encodeAddress(address);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): AlternateServer {
    const { family, port, addressBytes } = decodeAddress(message.getValue(span), 'ALTERNATE-SERVER');
    return new AlternateServer({ address: formatAddress(family, addressBytes), port });
  }

  encodeLength(): number {
    return this.value.length;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    builder.append(this.value);
  }
}

/**
 * XOR-MAPPED-ADDRESS: reflexive transport address, obfuscated so that
 * middleboxes do not rewrite it
 *
 * @category Attributes
 *
 * @example
 * ```typescript
 * response.addAttr(new XorMappedAddress({ address: '192.0.2.1', port: 32853 }));
 * ```
 */
export class XorMappedAddress implements Attribute {
  static readonly TYPE = ATTRIBUTE_TYPES.XOR_MAPPED_ADDRESS;

  readonly type = XorMappedAddress.TYPE;

  private readonly value: Uint8Array;

  constructor(readonly address: SocketAddress) {
    this.value = encodeAddress(address);
  }

  static decode(_ctx: void, message: Message, span: AttrSpan): XorMappedAddress {
    const value = Uint8Array.from(message.getValue(span));
    if (value.length >= 4) {
      xorAddressValue(value, message.transactionId);
    }

    const { family, port, addressBytes } = decodeAddress(value, 'XOR-MAPPED-ADDRESS');
    return new XorMappedAddress({ address: formatAddress(family, addressBytes), port });
  }

  encodeLength(): number {
    return this.value.length;
  }

  encode(_ctx: void, builder: MessageBuilder): void {
    const value = Uint8Array.from(this.value);
    xorAddressValue(value, builder.transactionId);
    builder.append(value);
  }
}
