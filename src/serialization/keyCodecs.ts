/**
 * Key Codecs
 * Canonical binary and JSON encodings for every key type
 */

import { z } from 'zod';
import { KeySetSerializationError } from '../keyset/errors';
import type { SizedCircuitKey, FixedCircuitKey } from '../keys/circuitKey';
import { FreezeProvingKey, MintProvingKey, TransferProvingKey } from '../keys/provingKeys';
import {
  FreezeVerifyingKey,
  MintVerifyingKey,
  TransactionVerifyingKey,
  TransferVerifyingKey,
  type TransactionKind
} from '../keys/verifyingKeys';
import { bytesToHex } from '../utils/bytes';
import type { CanonicalReader, CanonicalWriter } from './canonical';
import {
  countSchema,
  materialSchema,
  parseJson,
  withMessage,
  type JsonSchema
} from './jsonSchemas';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Encodes one key type both ways
 */
export interface KeyCodec<K> {
  encode(writer: CanonicalWriter, key: K): void;
  decode(reader: CanonicalReader): K;
  toJSON(key: K): JsonValue;
  /** Validates a JSON value and builds the key from it */
  readonly schema: JsonSchema<K>;
  fromJSON(json: unknown): K;
}

type SizedKeyConstructor<K extends SizedCircuitKey> = new (
  numInputs: number,
  numOutputs: number,
  material: Uint8Array
) => K;

type FixedKeyConstructor<K extends FixedCircuitKey> = new (material: Uint8Array) => K;

/**
 * Layout: u64 numInputs || u64 numOutputs || u64 length || material
 */
function sizedKeyCodec<K extends SizedCircuitKey>(
  Key: SizedKeyConstructor<K>,
  what: string
): KeyCodec<K> {
  const schema: JsonSchema<K> = z
    .object(
      { numInputs: countSchema, numOutputs: countSchema, material: materialSchema },
      withMessage('must be an object')
    )
    .transform((json) => new Key(json.numInputs, json.numOutputs, json.material));

  return {
    schema,
    encode(writer, key) {
      writer.writeU64(key.numInputs()).writeU64(key.numOutputs()).writeBytes(key.material);
    },
    decode(reader) {
      const numInputs = reader.readU64();
      const numOutputs = reader.readU64();
      return new Key(numInputs, numOutputs, reader.readBytes());
    },
    toJSON(key) {
      return {
        numInputs: key.numInputs(),
        numOutputs: key.numOutputs(),
        material: bytesToHex(key.material)
      };
    },
    fromJSON(json) {
      return parseJson(schema, json, what);
    }
  };
}

/**
 * Layout: u64 length || material
 */
function fixedKeyCodec<K extends FixedCircuitKey>(
  Key: FixedKeyConstructor<K>,
  what: string
): KeyCodec<K> {
  const schema: JsonSchema<K> = z
    .object({ material: materialSchema }, withMessage('must be an object'))
    .transform((json) => new Key(json.material));

  return {
    schema,
    encode(writer, key) {
      writer.writeBytes(key.material);
    },
    decode(reader) {
      return new Key(reader.readBytes());
    },
    toJSON(key) {
      return { material: bytesToHex(key.material) };
    },
    fromJSON(json) {
      return parseJson(schema, json, what);
    }
  };
}

export const transferProvingKeyCodec = sizedKeyCodec(TransferProvingKey, 'TransferProvingKey');
export const freezeProvingKeyCodec = sizedKeyCodec(FreezeProvingKey, 'FreezeProvingKey');
export const mintProvingKeyCodec = fixedKeyCodec(MintProvingKey, 'MintProvingKey');

export const transferVerifyingKeyCodec = sizedKeyCodec(TransferVerifyingKey, 'TransferVerifyingKey');
export const freezeVerifyingKeyCodec = sizedKeyCodec(FreezeVerifyingKey, 'FreezeVerifyingKey');
export const mintVerifyingKeyCodec = fixedKeyCodec(MintVerifyingKey, 'MintVerifyingKey');

const VARIANT_TAGS: Record<TransactionKind, number> = {
  transfer: 0,
  freeze: 1,
  mint: 2
};

const transactionVerifyingKeySchema: JsonSchema<TransactionVerifyingKey> = z
  .discriminatedUnion(
    'type',
    [
      z.object({ type: z.literal('transfer'), key: transferVerifyingKeyCodec.schema }),
      z.object({ type: z.literal('freeze'), key: freezeVerifyingKeyCodec.schema }),
      z.object({ type: z.literal('mint'), key: mintVerifyingKeyCodec.schema })
    ],
    {
      errorMap: (issue) => ({
        message:
          issue.code === 'invalid_union_discriminator'
            ? 'must be transfer, freeze or mint'
            : 'must be an object'
      })
    }
  )
  .transform((json) => {
    switch (json.type) {
      case 'transfer':
        return TransactionVerifyingKey.transfer(json.key);
      case 'freeze':
        return TransactionVerifyingKey.freeze(json.key);
      case 'mint':
        return TransactionVerifyingKey.mint(json.key);
    }
  });

/**
 * Layout: u8 tag (0 transfer, 1 freeze, 2 mint) || wrapped key
 *
 * JSON: `{ "type": "transfer" | "freeze" | "mint", "key": ... }`
 */
export const transactionVerifyingKeyCodec: KeyCodec<TransactionVerifyingKey> = {
  schema: transactionVerifyingKeySchema,

  encode(writer, vk) {
    const variant = vk.variant;
    writer.writeU8(VARIANT_TAGS[variant.type]);
    switch (variant.type) {
      case 'transfer':
        transferVerifyingKeyCodec.encode(writer, variant.key);
        break;
      case 'freeze':
        freezeVerifyingKeyCodec.encode(writer, variant.key);
        break;
      case 'mint':
        mintVerifyingKeyCodec.encode(writer, variant.key);
        break;
    }
  },

  decode(reader) {
    const tag = reader.readU8();
    switch (tag) {
      case VARIANT_TAGS.transfer:
        return TransactionVerifyingKey.transfer(transferVerifyingKeyCodec.decode(reader));
      case VARIANT_TAGS.freeze:
        return TransactionVerifyingKey.freeze(freezeVerifyingKeyCodec.decode(reader));
      case VARIANT_TAGS.mint:
        return TransactionVerifyingKey.mint(mintVerifyingKeyCodec.decode(reader));
      default:
        throw new KeySetSerializationError(`Unknown verifying key tag ${tag}`);
    }
  },

  toJSON(vk) {
    const variant = vk.variant;
    switch (variant.type) {
      case 'transfer':
        return { type: variant.type, key: transferVerifyingKeyCodec.toJSON(variant.key) };
      case 'freeze':
        return { type: variant.type, key: freezeVerifyingKeyCodec.toJSON(variant.key) };
      case 'mint':
        return { type: variant.type, key: mintVerifyingKeyCodec.toJSON(variant.key) };
    }
  },

  fromJSON(json) {
    return parseJson(transactionVerifyingKeySchema, json, 'TransactionVerifyingKey');
  }
};
