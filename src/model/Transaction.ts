import { LendingEngineError } from '../utils/Errors';

export type TransactionResult<T> = TransactionSuccess<T> | TransactionFailure;

export interface TransactionSuccess<T> {
  success: true;
  txIndex: number;
  value: T;
}

export interface TransactionFailure {
  success: false;
  txIndex: number;
  error: LendingEngineError;
}
