/**
 * Tests for hash utilities
 */

import { keccak_256 } from '@noble/hashes/sha3';
import { CommitmentBuilder, hashToHex, keccak256 } from '../../src/utils/hash';
import { concatBytes, stringToBytes, u64ToLEBytes } from '../../src/utils/bytes';

describe('keccak256', () => {
  test('hashes empty input correctly', () => {
    expect(hashToHex(keccak256(new Uint8Array(0)))).toBe(
      'c5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470'
    );
  });

  test('returns 32 bytes', () => {
    expect(keccak256(new Uint8Array([1, 2, 3])).length).toBe(32);
  });
});

describe('CommitmentBuilder', () => {
  test('absorbs the label, then length-prefixed fields', () => {
    const payload = new Uint8Array([7, 8, 9]);
    const digest = new CommitmentBuilder('label').varSizeBytes(payload).finalize();

    expect(digest).toEqual(
      keccak_256(concatBytes(stringToBytes('label'), u64ToLEBytes(3), payload))
    );
  });

  test('separates domains by label', () => {
    const payload = new Uint8Array([1]);
    const a = new CommitmentBuilder('a').varSizeBytes(payload).finalize();
    const b = new CommitmentBuilder('b').varSizeBytes(payload).finalize();
    expect(a).not.toEqual(b);
  });

  test('length prefixes keep field boundaries apart', () => {
    const a = new CommitmentBuilder('x')
      .varSizeBytes(new Uint8Array([1, 2]))
      .varSizeBytes(new Uint8Array([3]))
      .finalize();
    const b = new CommitmentBuilder('x')
      .varSizeBytes(new Uint8Array([1]))
      .varSizeBytes(new Uint8Array([2, 3]))
      .finalize();
    expect(a).not.toEqual(b);
  });

  test('cannot be used after finalize', () => {
    const builder = new CommitmentBuilder('x');
    builder.finalize();
    expect(() => builder.varSizeBytes(new Uint8Array(0))).toThrow('CommitmentBuilder: already finalized');
    expect(() => builder.finalize()).toThrow('CommitmentBuilder: already finalized');
  });
});
