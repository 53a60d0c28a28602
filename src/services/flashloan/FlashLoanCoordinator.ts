import { Checkpointable } from '../../model/Checkpoint';
import { ExecutionContext } from '../../model/ExecutionContext';
import { FlashLoan, FlashLoanConfig, FlashLoanReceipt, FlashLoanState, FlashLoanStrategy } from '../../model/FlashLoan';
import { StateCheckpointer } from '../../executor/StateCheckpointer';
import { BPS } from '../../utils/Constants';
import {
  ConfigurationError,
  InvalidAmountError,
  RepaymentInsufficientError,
  UnknownStrategyError
} from '../../utils/Errors';
import { bpsMul, Rounding } from '../../utils/FixedPointMath';
import { Log, Warn } from '../../utils/Logger';
import { ReentrancyGuard } from '../../utils/ReentrancyGuard';
import { norm } from '../../utils/TokenUtils';
import { DeepCopy } from '../../utils/Utils';
import { TokenLedger } from '../ledger/TokenLedger';
import { LendingPool } from '../lending/LendingPool';

// repayments are only counted when they land here
export const FLASH_LOAN_ESCROW_ACCOUNT = 'flashloan:escrow';

/**
 * Lends reserve cash for the duration of one strategy call.
 * Repayment below amount + fee restores every registered component to its state before the loan.
 */
export class FlashLoanCoordinator implements Checkpointable<FlashLoanState> {
  private state: FlashLoanState = { loansExecuted: 0, feesCollected: {} };
  private strategies = new Map<string, FlashLoanStrategy>();
  private readonly guard = new ReentrancyGuard('flash loan coordinator');

  constructor(
    private readonly ledger: TokenLedger,
    private readonly pool: LendingPool,
    private readonly checkpointer: StateCheckpointer,
    private readonly config: FlashLoanConfig
  ) {
    if (config.feeBps < 0 || config.feeBps >= Number(BPS)) {
      throw new ConfigurationError(`flash loan fee ${config.feeBps} out of range`);
    }
  }

  registerStrategy(strategy: FlashLoanStrategy) {
    if (this.strategies.has(strategy.id)) {
      throw new ConfigurationError(`flash loan strategy ${strategy.id} already registered`);
    }
    this.strategies.set(strategy.id, strategy);
  }

  getStrategyIds(): string[] {
    return Array.from(this.strategies.keys());
  }

  flashFee(amount: bigint): bigint {
    return bpsMul(amount, this.config.feeBps, Rounding.UP);
  }

  maxFlashLoan(asset: string): bigint {
    return this.pool.flashLiquidity(asset);
  }

  execute(ctx: ExecutionContext, asset: string, amount: bigint, strategyId: string, params: unknown): FlashLoanReceipt {
    return this.guard.run(() => {
      const strategy = this.strategies.get(strategyId);
      if (!strategy) {
        throw new UnknownStrategyError(strategyId);
      }
      if (amount <= 0n) {
        throw new InvalidAmountError(`flash loan amount must be positive, got ${amount}`);
      }

      const fee = this.flashFee(amount);
      const checkpoint = this.checkpointer.capture();
      try {
        const loan: FlashLoan = { asset, amount, fee, initiator: ctx.callerId, repayTo: FLASH_LOAN_ESCROW_ACCOUNT };
        const escrowBefore = this.ledger.balanceOf(asset, FLASH_LOAN_ESCROW_ACCOUNT);
        this.pool.lendFlash(asset, amount, ctx.callerId);

        strategy.onFlashLoan(ctx, loan, params);

        const repaid = this.ledger.balanceOf(asset, FLASH_LOAN_ESCROW_ACCOUNT) - escrowBefore;
        if (repaid < amount + fee) {
          throw new RepaymentInsufficientError(asset, repaid, amount + fee);
        }

        const settled = this.pool.settleFlash(asset, FLASH_LOAN_ESCROW_ACCOUNT, repaid, amount);
        this.state.loansExecuted++;
        this.state.feesCollected[asset] = (this.state.feesCollected[asset] ?? 0n) + (settled > amount ? settled - amount : 0n);

        const decimals = this.ledger.decimalsOf(asset);
        Log(
          `FlashLoanCoordinator: ${ctx.callerId} borrowed ${norm(amount, decimals)} ${asset} via ${strategyId}, repaid ${norm(repaid, decimals)}`
        );
        return { asset, amount, fee, repaid, strategyId };
      } catch (e) {
        this.checkpointer.restore(checkpoint);
        Warn(`FlashLoanCoordinator: flash loan of ${amount} ${asset} via ${strategyId} reverted`, e);
        throw e;
      }
    });
  }

  snapshot(): FlashLoanState {
    return DeepCopy(this.state);
  }

  restore(state: FlashLoanState) {
    this.state = DeepCopy(state);
  }
}
