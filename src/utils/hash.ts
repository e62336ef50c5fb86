/**
 * Hash Utilities
 * Keccak-256 and the domain-separated commitment builder built on it
 */

import { keccak_256 } from '@noble/hashes/sha3';
import { bytesToHex, stringToBytes, u64ToLEBytes } from './bytes';

/**
 * Keccak-256 hash
 */
export function keccak256(data: Uint8Array): Uint8Array {
  return keccak_256(data);
}

/**
 * Incremental commitment over a labelled byte stream.
 *
 * The label is absorbed first, so two commitments with different labels never
 * collide on the same payload. Variable-length fields are length-prefixed
 * (u64 little-endian) so adjacent fields cannot be re-split.
 */
export class CommitmentBuilder {
  private hasher = keccak_256.create();
  private finalized = false;

  constructor(label: string) {
    this.hasher.update(stringToBytes(label));
  }

  /**
   * Absorb a length-prefixed byte string
   */
  varSizeBytes(bytes: Uint8Array): this {
    this.assertOpen();
    this.hasher.update(u64ToLEBytes(bytes.length));
    this.hasher.update(bytes);
    return this;
  }

  finalize(): Uint8Array {
    this.assertOpen();
    this.finalized = true;
    return this.hasher.digest();
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new Error('CommitmentBuilder: already finalized');
    }
  }
}

/**
 * Convert hash to hex string (for display)
 */
export function hashToHex(hash: Uint8Array): string {
  return bytesToHex(hash);
}
