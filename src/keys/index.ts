export { SizedCircuitKey, FixedCircuitKey } from './circuitKey';
export { TransferProvingKey, FreezeProvingKey, MintProvingKey } from './provingKeys';
export {
  TransferVerifyingKey,
  FreezeVerifyingKey,
  MintVerifyingKey,
  TransactionVerifyingKey
} from './verifyingKeys';
export type { TransactionVerifyingKeyVariant, TransactionKind } from './verifyingKeys';
