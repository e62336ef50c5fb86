/**
 * Opaque circuit key material
 *
 * Keys are generated by an external setup ceremony. This package only needs
 * their size and their canonical bytes, so key material is carried as-is.
 */

import { assertShape } from '../keyset/shape';
import type { SizedKey } from '../keyset/sizedKey';

function sameMaterial(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

/**
 * A key whose circuit was generated for a variable transaction size
 */
export abstract class SizedCircuitKey implements SizedKey {
  /** Canonical bytes produced by the key generator */
  readonly material: Uint8Array;

  private readonly inputs: number;
  private readonly outputs: number;

  constructor(numInputs: number, numOutputs: number, material: Uint8Array) {
    assertShape(numInputs, numOutputs);
    this.inputs = numInputs;
    this.outputs = numOutputs;
    this.material = material;
  }

  numInputs(): number {
    return this.inputs;
  }

  numOutputs(): number {
    return this.outputs;
  }

  equals(other: this): boolean {
    return (
      this.inputs === other.inputs &&
      this.outputs === other.outputs &&
      sameMaterial(this.material, other.material)
    );
  }
}

/**
 * A key for a circuit with a single, protocol-fixed size
 */
export abstract class FixedCircuitKey {
  readonly material: Uint8Array;

  constructor(material: Uint8Array) {
    this.material = material;
  }

  equals(other: this): boolean {
    return sameMaterial(this.material, other.material);
  }
}
