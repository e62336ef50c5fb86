/**
 * SizedKey capability
 */

import type { Shape } from './shape';

/**
 * A circuit key that reports the transaction size it was generated for.
 * Both accessors must be pure and stable for the key's lifetime.
 */
export interface SizedKey {
  numInputs(): number;
  numOutputs(): number;
}

export function shapeOf(key: SizedKey): Shape {
  return { numInputs: key.numInputs(), numOutputs: key.numOutputs() };
}
