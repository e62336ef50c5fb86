/**
 * JSON Schemas
 *
 * Zod schemas shared by the JSON decoders, and the adapter that turns a
 * failed parse into a KeySetSerializationError naming the offending field.
 */

import { z } from 'zod';
import { KeySetSerializationError } from '../keyset/errors';
import { isValidCount } from '../keyset/shape';
import { hexToBytes } from '../utils/bytes';

/** Schema that accepts any JSON value and produces `T` */
export type JsonSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Creation params that replace every issue raised by the schema itself
 * (not its children) with `message`
 */
export function withMessage(message: string): { errorMap: z.ZodErrorMap } {
  return { errorMap: () => ({ message }) };
}

export const countSchema = z
  .number(withMessage('must be a non-negative integer'))
  .refine(isValidCount, 'must be a non-negative integer');

export const materialSchema = z
  .string(withMessage('must be a hex string'))
  .regex(/^(0x)?(?:[0-9a-fA-F]{2})*$/, 'must be a hex string')
  .transform((hex) => hexToBytes(hex));

const sortKeySchema = z.tuple(
  [countSchema, countSchema],
  withMessage('must be a pair of counts')
);

/**
 * `{ "keys": [ [[a, b], key], ... ] }` with each key left for its codec
 */
export const keySetJsonSchema = z.object(
  {
    keys: z.array(
      z.tuple([sortKeySchema, z.unknown()], withMessage('must be a [sortKey, key] pair')),
      withMessage('must be an array')
    )
  },
  withMessage('must be an object')
);

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.map((segment) => (typeof segment === 'number' ? `[${segment}]` : `.${segment}`)).join('');
}

/**
 * Validate `json` against `schema`.
 *
 * @param what - name of the value, prefixed to the failing field's path
 * @throws KeySetSerializationError describing the first issue
 */
export function parseJson<T>(schema: JsonSchema<T>, json: unknown, what: string): T {
  const result = schema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue ? `${what}${formatPath(issue.path)}` : what;
    throw new KeySetSerializationError(`${location} ${issue?.message ?? 'is invalid'}`);
  }
  return result.data;
}
