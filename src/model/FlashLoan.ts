import { ExecutionContext } from './ExecutionContext';

export interface FlashLoanConfig {
  feeBps: number;
}

export interface FlashLoan {
  asset: string;
  amount: bigint;
  fee: bigint;
  initiator: string;
  repayTo: string; // account the strategy must send amount + fee to
}

/**
 * Strategy invoked with the borrowed funds. `params` come from the caller untyped:
 * each strategy validates its own.
 */
export interface FlashLoanStrategy {
  readonly id: string;
  onFlashLoan(ctx: ExecutionContext, loan: FlashLoan, params: unknown): void;
}

export interface FlashLoanReceipt {
  asset: string;
  amount: bigint;
  fee: bigint;
  repaid: bigint;
  strategyId: string;
}

export interface FlashLoanState {
  loansExecuted: number;
  feesCollected: { [asset: string]: bigint };
}
