/**
 * Key ordering strategies
 *
 * A strategy projects a shape onto a totally ordered sort key. It picks which
 * axis is primary, and with it which best-fit queries can start their scan
 * close to the answer. Strategies are stateless and fixed per KeySet.
 */

export type SortKey = readonly [number, number];

export type KeyOrderName = 'inputs' | 'outputs';

export interface KeyOrder {
  readonly name: KeyOrderName;
  /** Must be injective: distinct shapes map to distinct sort keys */
  sortKey(numInputs: number, numOutputs: number): SortKey;
}

/**
 * Sort by number of inputs, then by number of outputs
 */
export class OrderByInputs implements KeyOrder {
  readonly name = 'inputs' as const;

  sortKey(numInputs: number, numOutputs: number): SortKey {
    return [numInputs, numOutputs];
  }
}

/**
 * Sort by number of outputs, then by number of inputs
 */
export class OrderByOutputs implements KeyOrder {
  readonly name = 'outputs' as const;

  sortKey(numInputs: number, numOutputs: number): SortKey {
    return [numOutputs, numInputs];
  }
}

export const orderByInputs = new OrderByInputs();
export const orderByOutputs = new OrderByOutputs();

/**
 * Lexicographic comparison of sort keys
 */
export function compareSortKeys(a: SortKey, b: SortKey): number {
  if (a[0] !== b[0]) {
    return a[0] < b[0] ? -1 : 1;
  }
  if (a[1] !== b[1]) {
    return a[1] < b[1] ? -1 : 1;
  }
  return 0;
}
