/**
 * Key bundles
 *
 * The full set of keys a node needs for one side of the protocol: a mint key
 * (mint transactions have a single size) plus size-indexed sets of transfer
 * and freeze keys, all ordered by the same strategy.
 */

import { z } from 'zod';
import { KeyKindMismatchError } from '../keyset/errors';
import type { KeyOrder } from '../keyset/keyOrder';
import { KeySet, type KeySetConfig } from '../keyset/keySet';
import type { FreezeProvingKey, MintProvingKey, TransferProvingKey } from '../keys/provingKeys';
import type { TransactionKind, TransactionVerifyingKey } from '../keys/verifyingKeys';
import { CanonicalReader, CanonicalWriter } from '../serialization/canonical';
import { parseJson, withMessage } from '../serialization/jsonSchemas';
import {
  freezeProvingKeyCodec,
  mintProvingKeyCodec,
  transactionVerifyingKeyCodec,
  transferProvingKeyCodec,
  type JsonValue
} from '../serialization/keyCodecs';
import { keySetToJSON, readKeySet, readKeySetJSON, writeKeySet } from '../serialization/keySetCodec';

export interface ProverKeySet<O extends KeyOrder = KeyOrder> {
  mint: MintProvingKey;
  xfr: KeySet<TransferProvingKey, O>;
  freeze: KeySet<FreezeProvingKey, O>;
}

export interface VerifierKeySet<O extends KeyOrder = KeyOrder> {
  mint: TransactionVerifyingKey;
  xfr: KeySet<TransactionVerifyingKey, O>;
  freeze: KeySet<TransactionVerifyingKey, O>;
}

export interface KeyBatches<M, X, F> {
  mint: M;
  xfr: Iterable<X>;
  freeze: Iterable<F>;
}

function subConfig(config: Partial<KeySetConfig> | undefined, slot: string): Partial<KeySetConfig> {
  return { ...config, label: `${config?.label ?? 'KeySet'}:${slot}` };
}

export function createProverKeySet<O extends KeyOrder>(
  batches: KeyBatches<MintProvingKey, TransferProvingKey, FreezeProvingKey>,
  order: O,
  config?: Partial<KeySetConfig>
): ProverKeySet<O> {
  return {
    mint: batches.mint,
    xfr: KeySet.create(batches.xfr, order, subConfig(config, 'xfr')),
    freeze: KeySet.create(batches.freeze, order, subConfig(config, 'freeze'))
  };
}

function* expectKind(
  keys: Iterable<TransactionVerifyingKey>,
  slot: string,
  kind: TransactionKind
): Generator<TransactionVerifyingKey> {
  for (const key of keys) {
    if (key.type !== kind) {
      throw new KeyKindMismatchError(slot, kind, key.type);
    }
    yield key;
  }
}

/**
 * @throws KeyKindMismatchError if a verifying key sits in the wrong slot
 */
export function createVerifierKeySet<O extends KeyOrder>(
  batches: KeyBatches<TransactionVerifyingKey, TransactionVerifyingKey, TransactionVerifyingKey>,
  order: O,
  config?: Partial<KeySetConfig>
): VerifierKeySet<O> {
  if (batches.mint.type !== 'mint') {
    throw new KeyKindMismatchError('mint', 'mint', batches.mint.type);
  }
  return {
    mint: batches.mint,
    xfr: KeySet.create(expectKind(batches.xfr, 'xfr', 'transfer'), order, subConfig(config, 'xfr')),
    freeze: KeySet.create(
      expectKind(batches.freeze, 'freeze', 'freeze'),
      order,
      subConfig(config, 'freeze')
    )
  };
}

export function proverKeySetsEqual(a: ProverKeySet, b: ProverKeySet): boolean {
  return (
    a.mint.equals(b.mint) &&
    a.xfr.equals(b.xfr, (x, y) => x.equals(y)) &&
    a.freeze.equals(b.freeze, (x, y) => x.equals(y))
  );
}

export function verifierKeySetsEqual(a: VerifierKeySet, b: VerifierKeySet): boolean {
  return (
    a.mint.equals(b.mint) &&
    a.xfr.equals(b.xfr, (x, y) => x.equals(y)) &&
    a.freeze.equals(b.freeze, (x, y) => x.equals(y))
  );
}

/**
 * Layout: mint || xfr || freeze
 */
export function encodeProverKeySet(keys: ProverKeySet): Uint8Array {
  const writer = new CanonicalWriter();
  mintProvingKeyCodec.encode(writer, keys.mint);
  writeKeySet(writer, keys.xfr, transferProvingKeyCodec);
  writeKeySet(writer, keys.freeze, freezeProvingKeyCodec);
  return writer.finish();
}

export function decodeProverKeySet<O extends KeyOrder>(
  bytes: Uint8Array,
  order: O,
  config?: Partial<KeySetConfig>
): ProverKeySet<O> {
  const reader = new CanonicalReader(bytes);
  const mint = mintProvingKeyCodec.decode(reader);
  const xfr = readKeySet(reader, transferProvingKeyCodec, order, subConfig(config, 'xfr'));
  const freeze = readKeySet(reader, freezeProvingKeyCodec, order, subConfig(config, 'freeze'));
  reader.finish();
  return { mint, xfr, freeze };
}

/**
 * Layout: mint || xfr || freeze
 */
export function encodeVerifierKeySet(keys: VerifierKeySet): Uint8Array {
  const writer = new CanonicalWriter();
  transactionVerifyingKeyCodec.encode(writer, keys.mint);
  writeKeySet(writer, keys.xfr, transactionVerifyingKeyCodec);
  writeKeySet(writer, keys.freeze, transactionVerifyingKeyCodec);
  return writer.finish();
}

export function decodeVerifierKeySet<O extends KeyOrder>(
  bytes: Uint8Array,
  order: O,
  config?: Partial<KeySetConfig>
): VerifierKeySet<O> {
  const reader = new CanonicalReader(bytes);
  const mint = transactionVerifyingKeyCodec.decode(reader);
  const xfr = readKeySet(reader, transactionVerifyingKeyCodec, order, subConfig(config, 'xfr'));
  const freeze = readKeySet(reader, transactionVerifyingKeyCodec, order, subConfig(config, 'freeze'));
  reader.finish();
  return { mint, xfr, freeze };
}

/** Key sets are validated by their own schema once the ordering is known */
const proverKeySetJsonSchema = z.object(
  { mint: mintProvingKeyCodec.schema, xfr: z.unknown(), freeze: z.unknown() },
  withMessage('must be an object')
);

const verifierKeySetJsonSchema = z.object(
  { mint: transactionVerifyingKeyCodec.schema, xfr: z.unknown(), freeze: z.unknown() },
  withMessage('must be an object')
);

export function proverKeySetToJSON(keys: ProverKeySet): JsonValue {
  return {
    mint: mintProvingKeyCodec.toJSON(keys.mint),
    xfr: keySetToJSON(keys.xfr, transferProvingKeyCodec),
    freeze: keySetToJSON(keys.freeze, freezeProvingKeyCodec)
  };
}

export function proverKeySetFromJSON<O extends KeyOrder>(
  json: unknown,
  order: O,
  config?: Partial<KeySetConfig>
): ProverKeySet<O> {
  const bundle = parseJson(proverKeySetJsonSchema, json, 'ProverKeySet');
  return {
    mint: bundle.mint,
    xfr: readKeySetJSON(bundle.xfr, transferProvingKeyCodec, order, subConfig(config, 'xfr'), 'ProverKeySet.xfr'),
    freeze: readKeySetJSON(
      bundle.freeze,
      freezeProvingKeyCodec,
      order,
      subConfig(config, 'freeze'),
      'ProverKeySet.freeze'
    )
  };
}

export function verifierKeySetToJSON(keys: VerifierKeySet): JsonValue {
  return {
    mint: transactionVerifyingKeyCodec.toJSON(keys.mint),
    xfr: keySetToJSON(keys.xfr, transactionVerifyingKeyCodec),
    freeze: keySetToJSON(keys.freeze, transactionVerifyingKeyCodec)
  };
}

export function verifierKeySetFromJSON<O extends KeyOrder>(
  json: unknown,
  order: O,
  config?: Partial<KeySetConfig>
): VerifierKeySet<O> {
  const bundle = parseJson(verifierKeySetJsonSchema, json, 'VerifierKeySet');
  return {
    mint: bundle.mint,
    xfr: readKeySetJSON(
      bundle.xfr,
      transactionVerifyingKeyCodec,
      order,
      subConfig(config, 'xfr'),
      'VerifierKeySet.xfr'
    ),
    freeze: readKeySetJSON(
      bundle.freeze,
      transactionVerifyingKeyCodec,
      order,
      subConfig(config, 'freeze'),
      'VerifierKeySet.freeze'
    )
  };
}
