/**
 * Tests for key ordering strategies
 */

import { compareSortKeys, orderByInputs, orderByOutputs } from '../../src/keyset/keyOrder';
import { dominates, formatShape } from '../../src/keyset/shape';

describe('orderByInputs', () => {
  test('puts inputs first', () => {
    expect(orderByInputs.sortKey(3, 1)).toEqual([3, 1]);
    expect(orderByInputs.name).toBe('inputs');
  });

  test('sorts (3, 1) after (2, 2)', () => {
    expect(compareSortKeys(orderByInputs.sortKey(3, 1), orderByInputs.sortKey(2, 2))).toBe(1);
  });
});

describe('orderByOutputs', () => {
  test('puts outputs first', () => {
    expect(orderByOutputs.sortKey(3, 1)).toEqual([1, 3]);
    expect(orderByOutputs.name).toBe('outputs');
  });

  test('sorts (3, 1) before (2, 2)', () => {
    expect(compareSortKeys(orderByOutputs.sortKey(3, 1), orderByOutputs.sortKey(2, 2))).toBe(-1);
  });
});

describe('compareSortKeys', () => {
  test('compares the first component, then the second', () => {
    expect(compareSortKeys([1, 9], [2, 0])).toBe(-1);
    expect(compareSortKeys([2, 0], [1, 9])).toBe(1);
    expect(compareSortKeys([2, 1], [2, 3])).toBe(-1);
    expect(compareSortKeys([2, 3], [2, 1])).toBe(1);
    expect(compareSortKeys([2, 3], [2, 3])).toBe(0);
  });

  test('both strategies are injective on a grid of sizes', () => {
    for (const order of [orderByInputs, orderByOutputs]) {
      const seen = new Set<string>();
      for (let i = 0; i < 8; i++) {
        for (let o = 0; o < 8; o++) {
          seen.add(order.sortKey(i, o).join(','));
        }
      }
      expect(seen.size).toBe(64);
    }
  });
});

describe('shape helpers', () => {
  test('dominates requires both counts to be at least as large', () => {
    expect(dominates({ numInputs: 2, numOutputs: 3 }, { numInputs: 2, numOutputs: 2 })).toBe(true);
    expect(dominates({ numInputs: 3, numOutputs: 1 }, { numInputs: 2, numOutputs: 2 })).toBe(false);
    expect(dominates({ numInputs: 1, numOutputs: 1 }, { numInputs: 1, numOutputs: 1 })).toBe(true);
  });

  test('formatShape', () => {
    expect(formatShape({ numInputs: 2, numOutputs: 3 })).toBe('(2, 3)');
  });
});
