export { KeySet } from './keySet';
export type { BestFit, KeySetConfig, KeySetEntry } from './keySet';
export { OrderByInputs, OrderByOutputs, orderByInputs, orderByOutputs, compareSortKeys } from './keyOrder';
export type { KeyOrder, KeyOrderName, SortKey } from './keyOrder';
export { assertShape, dominates, formatShape } from './shape';
export type { Shape } from './shape';
export { shapeOf } from './sizedKey';
export type { SizedKey } from './sizedKey';
export {
  KeySetError,
  DuplicateKeysError,
  NoKeysError,
  InvalidShapeError,
  KeyKindMismatchError,
  KeySetSerializationError,
  KeySetInvariantError
} from './errors';
export type { KeySetErrorCode } from './errors';
