/**
 * Verifying keys
 */

import type { SizedKey } from '../keyset/sizedKey';
import { FixedCircuitKey, SizedCircuitKey } from './circuitKey';

export class TransferVerifyingKey extends SizedCircuitKey {
  readonly kind = 'transfer-verifying' as const;
}

export class FreezeVerifyingKey extends SizedCircuitKey {
  readonly kind = 'freeze-verifying' as const;
}

export class MintVerifyingKey extends FixedCircuitKey {
  readonly kind = 'mint-verifying' as const;
}

export type TransactionVerifyingKeyVariant =
  | { type: 'transfer'; key: TransferVerifyingKey }
  | { type: 'freeze'; key: FreezeVerifyingKey }
  | { type: 'mint'; key: MintVerifyingKey };

export type TransactionKind = TransactionVerifyingKeyVariant['type'];

/**
 * Verifying key for any transaction kind
 */
export class TransactionVerifyingKey implements SizedKey {
  constructor(readonly variant: TransactionVerifyingKeyVariant) {}

  static transfer(key: TransferVerifyingKey): TransactionVerifyingKey {
    return new TransactionVerifyingKey({ type: 'transfer', key });
  }

  static freeze(key: FreezeVerifyingKey): TransactionVerifyingKey {
    return new TransactionVerifyingKey({ type: 'freeze', key });
  }

  static mint(key: MintVerifyingKey): TransactionVerifyingKey {
    return new TransactionVerifyingKey({ type: 'mint', key });
  }

  get type(): TransactionKind {
    return this.variant.type;
  }

  numInputs(): number {
    switch (this.variant.type) {
      case 'transfer':
      case 'freeze':
        return this.variant.key.numInputs();
      case 'mint':
        // Mint transactions always consume one input (the fee) and create
        // two outputs (the minted record and the fee change).
        return 1;
    }
  }

  numOutputs(): number {
    switch (this.variant.type) {
      case 'transfer':
      case 'freeze':
        return this.variant.key.numOutputs();
      case 'mint':
        return 2;
    }
  }

  /**
   * Same variant wrapping an equal key
   */
  equals(other: TransactionVerifyingKey): boolean {
    const mine = this.variant;
    const theirs = other.variant;
    switch (mine.type) {
      case 'transfer':
        return theirs.type === 'transfer' && mine.key.equals(theirs.key);
      case 'freeze':
        return theirs.type === 'freeze' && mine.key.equals(theirs.key);
      case 'mint':
        return theirs.type === 'mint' && mine.key.equals(theirs.key);
    }
  }
}
