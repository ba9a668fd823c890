/**
 * IP address text <-> bytes conversion for the address attributes
 */

import { StunEncodeError } from './errors.js';

/**
 * Checks if an address is IPv6
 */
export function isIPv6(ip: string): boolean {
  return ip.includes(':');
}

/**
 * Parses IPv4 address string to bytes
 */
export function parseIPv4(ip: string): Uint8Array {
  const parts = ip.split('.');
  if (parts.length !== 4) {
    throw new StunEncodeError(`Invalid IPv4 address: ${ip}`);
  }

  const bytes = new Uint8Array(4);
  for (let i = 0; i < 4; i++) {
    if (!/^\d{1,3}$/.test(parts[i])) {
      throw new StunEncodeError(`Invalid IPv4 address: ${ip}`);
    }
    const value = parseInt(parts[i], 10);
    if (value > 255) {
      throw new StunEncodeError(`Invalid IPv4 address: ${ip}`);
    }
    bytes[i] = value;
  }

  return bytes;
}

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;
const HEX_GROUP = /^[0-9a-f]{1,4}$/i;

function splitGroups(part: string): string[] {
  return part === '' ? [] : part.split(':');
}

/**
 * Parses IPv6 address string to bytes
 *
 * Accepts `::` compression, the IPv4-mapped form (`::ffff:192.0.2.1`)
 * and a surrounding pair of brackets.
 */
export function parseIPv6(ip: string): Uint8Array {
  const text = ip.startsWith('[') && ip.endsWith(']') ? ip.slice(1, -1) : ip;
  const bytes = new Uint8Array(16);

  const mapped = IPV4_MAPPED.exec(text);
  if (mapped) {
    bytes[10] = 0xff;
    bytes[11] = 0xff;
    bytes.set(parseIPv4(mapped[1]), 12);
    return bytes;
  }

  const halves = text.split('::');
  if (halves.length > 2) {
    throw new StunEncodeError(`Invalid IPv6 address: ${ip}`);
  }

  const head = splitGroups(halves[0]);
  const tail = halves.length === 2 ? splitGroups(halves[1]) : [];
  const missing = 8 - head.length - tail.length;
  if (halves.length === 2 ? missing < 1 : missing !== 0) {
    throw new StunEncodeError(`Invalid IPv6 address: ${ip}`);
  }

  const groups = [...head, ...Array<string>(missing).fill('0'), ...tail];
  groups.forEach((group, i) => {
    if (!HEX_GROUP.test(group)) {
      throw new StunEncodeError(`Invalid IPv6 address: ${ip}`);
    }
    const value = parseInt(group, 16);
    bytes[i * 2] = value >> 8;
    bytes[i * 2 + 1] = value & 0xff;
  });

  return bytes;
}

/**
 * Formats IPv4 bytes as dotted-decimal string
 */
export function formatIPv4(bytes: Uint8Array): string {
  return Array.from(bytes).join('.');
}

/**
 * Formats IPv6 bytes as colon-separated hex string
 *
 * The longest run of two or more zero groups is compressed to `::`.
 */
export function formatIPv6(bytes: Uint8Array): string {
  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push((bytes[i] << 8) | bytes[i + 1]);
  }

  let bestStart = -1;
  let bestLength = 0;
  for (let i = 0; i < 8; ) {
    if (groups[i] !== 0) {
      i++;
      continue;
    }
    let j = i;
    while (j < 8 && groups[j] === 0) j++;
    if (j - i > bestLength) {
      bestStart = i;
      bestLength = j - i;
    }
    i = j;
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }

  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}
