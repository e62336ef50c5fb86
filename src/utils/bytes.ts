/**
 * Byte Utilities
 * Low-level byte helpers shared by the codecs and the commitment adapter
 */

export { bytesToHex, concatBytes, utf8ToBytes as stringToBytes } from '@noble/hashes/utils';

/**
 * Convert hex string to Uint8Array
 * Handles '0x' prefix and validates input
 */
export function hexToBytes(hex: string): Uint8Array {
  if (typeof hex !== 'string') {
    throw new Error('hexToBytes: input must be hex string');
  }

  // Remove '0x' prefix if present
  const clean = hex.startsWith('0x') ? hex.slice(2) : hex;

  if (clean.length % 2 !== 0) {
    throw new Error('hexToBytes: invalid hex string length');
  }

  const bytes = new Uint8Array(clean.length / 2);
  for (let i = 0; i < clean.length; i += 2) {
    const pair = clean.substring(i, i + 2);
    if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
      throw new Error(`hexToBytes: invalid hex character at position ${i}`);
    }
    bytes[i / 2] = parseInt(pair, 16);
  }
  return bytes;
}

/**
 * Encode a non-negative safe integer as 8 little-endian bytes
 */
export function u64ToLEBytes(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`u64ToLEBytes: ${value} is not a non-negative safe integer`);
  }
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, BigInt(value), true);
  return bytes;
}
