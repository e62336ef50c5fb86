/**
 * KeySet Errors
 */

export type KeySetErrorCode =
  | 'DUPLICATE_KEYS'
  | 'NO_KEYS'
  | 'INVALID_SHAPE'
  | 'KEY_KIND_MISMATCH'
  | 'SERIALIZATION'
  | 'INVARIANT';

/**
 * Base class for every error raised by this package
 */
export class KeySetError extends Error {
  constructor(
    public readonly code: KeySetErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'KeySetError';
  }
}

/**
 * Two keys in a construction batch support the same shape
 */
export class DuplicateKeysError extends KeySetError {
  constructor(
    public readonly numInputs: number,
    public readonly numOutputs: number
  ) {
    super(
      'DUPLICATE_KEYS',
      `Duplicate keys for size (${numInputs} inputs, ${numOutputs} outputs)`
    );
    this.name = 'DuplicateKeysError';
  }
}

/**
 * A construction batch was empty
 */
export class NoKeysError extends KeySetError {
  constructor() {
    super('NO_KEYS', 'A KeySet requires at least one key');
    this.name = 'NoKeysError';
  }
}

export class InvalidShapeError extends KeySetError {
  constructor(
    public readonly numInputs: number,
    public readonly numOutputs: number
  ) {
    super(
      'INVALID_SHAPE',
      `Invalid size (${numInputs}, ${numOutputs}): both counts must be non-negative safe integers`
    );
    this.name = 'InvalidShapeError';
  }
}

/**
 * A verifying key of the wrong variant was placed in a bundle slot
 */
export class KeyKindMismatchError extends KeySetError {
  constructor(
    public readonly slot: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super(
      'KEY_KIND_MISMATCH',
      `Bundle slot '${slot}' expects ${expected} keys, got a ${actual} key`
    );
    this.name = 'KeyKindMismatchError';
  }
}

/**
 * Encoded data could not be decoded into a valid value
 */
export class KeySetSerializationError extends KeySetError {
  constructor(message: string) {
    super('SERIALIZATION', message);
    this.name = 'KeySetSerializationError';
  }
}

/**
 * An internal guarantee was violated, for example by a KeySet decoded from
 * corrupted persisted state. Not meant to be caught and recovered from.
 */
export class KeySetInvariantError extends KeySetError {
  constructor(message: string) {
    super('INVARIANT', message);
    this.name = 'KeySetInvariantError';
  }
}
