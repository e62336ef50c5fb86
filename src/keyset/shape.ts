/**
 * Transaction shape: the (inputs, outputs) size a circuit key supports
 */

import { InvalidShapeError } from './errors';

export interface Shape {
  numInputs: number;
  numOutputs: number;
}

export function isValidCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Throw InvalidShapeError unless both counts are non-negative safe integers
 */
export function assertShape(numInputs: number, numOutputs: number): void {
  if (!isValidCount(numInputs) || !isValidCount(numOutputs)) {
    throw new InvalidShapeError(numInputs, numOutputs);
  }
}

/**
 * Whether `candidate` can serve a transaction of size `request`
 */
export function dominates(candidate: Shape, request: Shape): boolean {
  return (
    candidate.numInputs >= request.numInputs &&
    candidate.numOutputs >= request.numOutputs
  );
}

export function formatShape(shape: Shape): string {
  return `(${shape.numInputs}, ${shape.numOutputs})`;
}
