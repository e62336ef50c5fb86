/**
 * Circuit KeySet
 *
 * Size-indexed collections of pre-generated proving and verifying keys.
 * A transaction of a given (inputs, outputs) size picks its key by exact or
 * best-fit lookup instead of generating a circuit at run time.
 */

// Size-indexed collections
export * from './keyset/index';

// Key types
export * from './keys/index';

// Encodings
export { CanonicalReader, CanonicalWriter } from './serialization/canonical';
export {
  transferProvingKeyCodec,
  freezeProvingKeyCodec,
  mintProvingKeyCodec,
  transferVerifyingKeyCodec,
  freezeVerifyingKeyCodec,
  mintVerifyingKeyCodec,
  transactionVerifyingKeyCodec
} from './serialization/keyCodecs';
export type { KeyCodec, JsonValue } from './serialization/keyCodecs';
export type { JsonSchema } from './serialization/jsonSchemas';
export {
  encodeKeySet,
  decodeKeySet,
  keySetToJSON,
  keySetFromJSON
} from './serialization/keySetCodec';

// Bundles
export {
  createProverKeySet,
  createVerifierKeySet,
  encodeProverKeySet,
  decodeProverKeySet,
  encodeVerifierKeySet,
  decodeVerifierKeySet,
  proverKeySetToJSON,
  proverKeySetFromJSON,
  verifierKeySetToJSON,
  verifierKeySetFromJSON,
  proverKeySetsEqual,
  verifierKeySetsEqual
} from './bundles/keySets';
export type { ProverKeySet, VerifierKeySet, KeyBatches } from './bundles/keySets';
export { commitVerifierKeySet, VERIFIER_KEY_SET_COMMITMENT_LABEL } from './bundles/commitment';

// Utilities
export { bytesToHex, hexToBytes } from './utils/bytes';
export { keccak256, hashToHex, CommitmentBuilder } from './utils/hash';
