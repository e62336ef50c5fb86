/**
 * Proving keys
 */

import { FixedCircuitKey, SizedCircuitKey } from './circuitKey';

export class TransferProvingKey extends SizedCircuitKey {
  readonly kind = 'transfer-proving' as const;
}

export class FreezeProvingKey extends SizedCircuitKey {
  readonly kind = 'freeze-proving' as const;
}

export class MintProvingKey extends FixedCircuitKey {
  readonly kind = 'mint-proving' as const;
}
