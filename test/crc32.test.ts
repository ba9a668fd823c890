/**
 * CRC-32 tests
 *
 * Reference values are the standard CRC-32 (zlib / IEEE 802.3) check values.
 */

import { describe, it, expect } from 'vitest';
import { crc32, updateCrc32 } from '../src/index.js';

const ascii = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('crc32', () => {
  it('should match the standard check value for "123456789"', () => {
    expect(crc32(ascii('123456789'))).toBe(0xcbf43926);
  });

  it('should match the reference value for a pangram', () => {
    expect(crc32(ascii('The quick brown fox jumps over the lazy dog'))).toBe(0x414fa339);
  });

  it('should return 0 for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('should return an unsigned 32-bit value', () => {
    const value = crc32(new Uint8Array([0xff, 0xff, 0xff, 0xff]));

    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThanOrEqual(0xffffffff);
    expect(value).toBe(0xffffffff);
  });

  it('should be sensitive to a single bit flip', () => {
    const data = ascii('123456789');
    const flipped = Uint8Array.from(data);
    flipped[4] ^= 0x01;

    expect(crc32(flipped)).not.toBe(crc32(data));
  });
});

describe('updateCrc32', () => {
  it('should continue a checksum across chunks', () => {
    const whole = ascii('123456789');

    const first = crc32(whole.subarray(0, 4));
    const continued = updateCrc32(first, whole.subarray(4));

    expect(continued).toBe(0xcbf43926);
  });

  it('should equal crc32 when started from 0', () => {
    const data = ascii('STUN');
    expect(updateCrc32(0, data)).toBe(crc32(data));
  });
});
