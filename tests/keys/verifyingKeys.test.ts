/**
 * Tests for circuit key types
 */

import { InvalidShapeError } from '../../src/keyset/errors';
import { TransferProvingKey } from '../../src/keys/provingKeys';
import {
  FreezeVerifyingKey,
  MintVerifyingKey,
  TransactionVerifyingKey,
  TransferVerifyingKey
} from '../../src/keys/verifyingKeys';

describe('SizedCircuitKey', () => {
  test('reports the size it was created with', () => {
    const key = new TransferProvingKey(3, 5, new Uint8Array([1]));
    expect(key.numInputs()).toBe(3);
    expect(key.numOutputs()).toBe(5);
    expect(key.kind).toBe('transfer-proving');
  });

  test.each([
    [-1, 2],
    [1, -2],
    [1.5, 2],
    [Number.NaN, 2],
    [2 ** 53, 1]
  ])('rejects size (%p, %p)', (numInputs, numOutputs) => {
    expect(() => new TransferProvingKey(numInputs, numOutputs, new Uint8Array(0))).toThrow(
      InvalidShapeError
    );
  });
});

describe('TransactionVerifyingKey', () => {
  test('transfer variant delegates to the wrapped key', () => {
    const vk = TransactionVerifyingKey.transfer(new TransferVerifyingKey(4, 6, new Uint8Array(0)));
    expect(vk.type).toBe('transfer');
    expect([vk.numInputs(), vk.numOutputs()]).toEqual([4, 6]);
  });

  test('freeze variant delegates to the wrapped key', () => {
    const vk = TransactionVerifyingKey.freeze(new FreezeVerifyingKey(2, 2, new Uint8Array(0)));
    expect(vk.type).toBe('freeze');
    expect([vk.numInputs(), vk.numOutputs()]).toEqual([2, 2]);
  });

  test('mint variant always has one input and two outputs', () => {
    const vk = TransactionVerifyingKey.mint(new MintVerifyingKey(new Uint8Array([9, 9, 9])));
    expect(vk.type).toBe('mint');
    expect([vk.numInputs(), vk.numOutputs()]).toEqual([1, 2]);
  });
});

describe('key equality', () => {
  const material = new Uint8Array([1, 2, 3]);

  test('sized keys compare size and material', () => {
    const key = new TransferProvingKey(2, 2, material);
    expect(key.equals(new TransferProvingKey(2, 2, new Uint8Array([1, 2, 3])))).toBe(true);
    expect(key.equals(new TransferProvingKey(2, 3, material))).toBe(false);
    expect(key.equals(new TransferProvingKey(2, 2, new Uint8Array([1, 2])))).toBe(false);
  });

  test('verifying keys must share a variant', () => {
    const transfer = TransactionVerifyingKey.transfer(new TransferVerifyingKey(2, 2, material));
    const freeze = TransactionVerifyingKey.freeze(new FreezeVerifyingKey(2, 2, material));

    expect(transfer.equals(TransactionVerifyingKey.transfer(new TransferVerifyingKey(2, 2, material)))).toBe(true);
    expect(transfer.equals(freeze)).toBe(false);
    expect(
      TransactionVerifyingKey.mint(new MintVerifyingKey(material)).equals(
        TransactionVerifyingKey.mint(new MintVerifyingKey(new Uint8Array([1, 2, 3])))
      )
    ).toBe(true);
  });
});
