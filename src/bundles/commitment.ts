/**
 * Verifier key commitment
 *
 * Binds a VerifierKeySet into a 32-byte digest that ledger state can carry
 * in place of the keys themselves.
 */

import { KeySetInvariantError } from '../keyset/errors';
import { CommitmentBuilder } from '../utils/hash';
import { encodeVerifierKeySet, type VerifierKeySet } from './keySets';

export const VERIFIER_KEY_SET_COMMITMENT_LABEL = 'VerifCRS Comm';

/**
 * keccak256(label || u64le(len) || canonical bytes of the bundle)
 *
 * @throws KeySetInvariantError if the bundle cannot be serialized; a bundle
 * built through the constructors always can
 */
export function commitVerifierKeySet(keys: VerifierKeySet): Uint8Array {
  let bytes: Uint8Array;
  try {
    bytes = encodeVerifierKeySet(keys);
  } catch (error) {
    throw new KeySetInvariantError(
      `Failed to serialize VerifierKeySet for commitment: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return new CommitmentBuilder(VERIFIER_KEY_SET_COMMITMENT_LABEL).varSizeBytes(bytes).finalize();
}
