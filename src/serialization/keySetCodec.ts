/**
 * KeySet Codec
 *
 * Both encodings write a KeySet as the ordered sequence of its
 * (sort key, key) pairs rather than as a keyed map: some self-describing
 * formats only allow string map keys, and a fixed order makes the canonical
 * bytes (and any commitment over them) reproducible.
 */

import type { KeyOrder, SortKey } from '../keyset/keyOrder';
import { KeySet, type KeySetConfig, type KeySetEntry } from '../keyset/keySet';
import type { SizedKey } from '../keyset/sizedKey';
import { CanonicalReader, CanonicalWriter } from './canonical';
import { keySetJsonSchema, parseJson } from './jsonSchemas';
import type { JsonValue, KeyCodec } from './keyCodecs';

/**
 * Layout: u64 count || (u64 sortKey[0] || u64 sortKey[1] || key)*
 */
export function writeKeySet<K extends SizedKey>(
  writer: CanonicalWriter,
  set: KeySet<K>,
  codec: KeyCodec<K>
): void {
  writer.writeU64(set.size);
  for (const [sortKey, key] of set.entries()) {
    writer.writeU64(sortKey[0]).writeU64(sortKey[1]);
    codec.encode(writer, key);
  }
}

export function readKeySet<K extends SizedKey, O extends KeyOrder>(
  reader: CanonicalReader,
  codec: KeyCodec<K>,
  order: O,
  config?: Partial<KeySetConfig>
): KeySet<K, O> {
  const count = reader.readU64();
  const entries: KeySetEntry<K>[] = [];
  for (let i = 0; i < count; i++) {
    const sortKey: SortKey = [reader.readU64(), reader.readU64()];
    entries.push([sortKey, codec.decode(reader)]);
  }
  return KeySet.fromSortedEntries(entries, order, config);
}

export function encodeKeySet<K extends SizedKey>(set: KeySet<K>, codec: KeyCodec<K>): Uint8Array {
  const writer = new CanonicalWriter();
  writeKeySet(writer, set, codec);
  return writer.finish();
}

export function decodeKeySet<K extends SizedKey, O extends KeyOrder>(
  bytes: Uint8Array,
  codec: KeyCodec<K>,
  order: O,
  config?: Partial<KeySetConfig>
): KeySet<K, O> {
  const reader = new CanonicalReader(bytes);
  const set = readKeySet(reader, codec, order, config);
  reader.finish();
  return set;
}

/**
 * `{ "keys": [ [[a, b], key], ... ] }`
 */
export function keySetToJSON<K extends SizedKey>(set: KeySet<K>, codec: KeyCodec<K>): JsonValue {
  const keys: JsonValue[] = [];
  for (const [sortKey, key] of set.entries()) {
    keys.push([[sortKey[0], sortKey[1]], codec.toJSON(key)]);
  }
  return { keys };
}

/**
 * Decode one KeySet document. Entries are checked against `order` by
 * `KeySet.fromSortedEntries`.
 *
 * @param what - name used in error messages
 */
export function readKeySetJSON<K extends SizedKey, O extends KeyOrder>(
  json: unknown,
  codec: KeyCodec<K>,
  order: O,
  config: Partial<KeySetConfig> | undefined,
  what: string
): KeySet<K, O> {
  const document = parseJson(keySetJsonSchema, json, what);
  const entries = document.keys.map(
    ([sortKey, key], index): KeySetEntry<K> => [
      sortKey,
      parseJson(codec.schema, key, `${what}.keys[${index}][1]`)
    ]
  );
  return KeySet.fromSortedEntries(entries, order, config);
}

export function keySetFromJSON<K extends SizedKey, O extends KeyOrder>(
  json: unknown,
  codec: KeyCodec<K>,
  order: O,
  config?: Partial<KeySetConfig>
): KeySet<K, O> {
  return readKeySetJSON(json, codec, order, config, 'KeySet');
}
