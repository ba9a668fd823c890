/**
 * CRC-32 checksum
 *
 * Standard reflected CRC-32 (IEEE 802.3 / zlib), as required by the
 * STUN FINGERPRINT attribute.
 *
 * @category Checksum
 * @packageDocumentation
 */

const CRC32_TABLE = makeCrc32Table();

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[n] = c >>> 0;
  }
  return table;
}

/**
 * Continues a finished CRC-32 over another chunk of data
 *
 * @category Checksum
 *
 * @param crc - Checksum of the preceding data (0 for none)
 * @param data - Next chunk
 * @returns Checksum of the preceding data followed by `data`
 *
 * @example
 * ```typescript
 * updateCrc32(crc32(head), tail) === crc32(concat(head, tail));
 * ```
 */
export function updateCrc32(crc: number, data: Uint8Array): number {
  let c = (crc ^ 0xffffffff) >>> 0;
  for (let i = 0; i < data.length; i++) {
    c = CRC32_TABLE[(c ^ data[i]) & 0xff] ^ (c >>> 8);
  }
  return (c ^ 0xffffffff) >>> 0;
}

/**
 * Computes the CRC-32 of a byte slice
 *
 * @category Checksum
 *
 * @example
 * ```typescript
 * crc32(new TextEncoder().encode('123456789')); // 0xcbf43926
 * ```
 */
export function crc32(data: Uint8Array): number {
  return updateCrc32(0, data);
}
