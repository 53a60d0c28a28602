import { ExecutionContext } from '../../../model/ExecutionContext';
import { FlashLoan, FlashLoanStrategy } from '../../../model/FlashLoan';
import { InvalidStrategyParamsError } from '../../../utils/Errors';
import { Log } from '../../../utils/Logger';
import { AmmRegistry } from '../../amm/AmmRegistry';
import { TokenLedger } from '../../ledger/TokenLedger';
import { LiquidationEngine } from '../../liquidation/LiquidationEngine';

export interface LiquidationStrategyParams {
  owner: string;
  collateralAsset: string;
  poolId: string;
  maxCollateral: bigint;
  maxPrice: bigint;
  minSwapOutput: bigint;
}

/**
 * Zero capital liquidation: buy auctioned collateral with the borrowed debt asset, sell it on an AMM
 * pool for the debt asset, repay. What is left over stays with the initiator.
 */
export class LiquidationStrategy implements FlashLoanStrategy {
  static readonly ID = 'liquidation';
  readonly id = LiquidationStrategy.ID;

  constructor(
    private readonly ledger: TokenLedger,
    private readonly liquidations: LiquidationEngine,
    private readonly pools: AmmRegistry
  ) {}

  onFlashLoan(ctx: ExecutionContext, loan: FlashLoan, params: unknown) {
    const p = ParseLiquidationStrategyParams(this.id, params);
    const pool = this.pools.getPool(p.poolId);
    if (!pool.assets.includes(p.collateralAsset) || !pool.assets.includes(loan.asset)) {
      throw new InvalidStrategyParamsError(this.id, `pool ${p.poolId} does not trade ${p.collateralAsset}/${loan.asset}`);
    }

    const taken = this.liquidations.take(ctx, p.owner, p.collateralAsset, {
      maxCollateral: p.maxCollateral,
      maxPrice: p.maxPrice
    });
    const swap = pool.swapExactIn(ctx, p.collateralAsset, taken.collateralSeized, p.minSwapOutput);

    this.ledger.transfer(loan.asset, loan.initiator, loan.repayTo, loan.amount + loan.fee);
    Log(
      `LiquidationStrategy: took ${taken.collateralSeized} ${p.collateralAsset} for ${taken.debtRepaid}, sold for ${swap.amountOut} ${loan.asset}`
    );
  }
}

export function ParseLiquidationStrategyParams(strategyId: string, params: unknown): LiquidationStrategyParams {
  if (typeof params != 'object' || params == null) {
    throw new InvalidStrategyParamsError(strategyId, 'params must be an object');
  }

  const owner = readString(strategyId, params, 'owner');
  const collateralAsset = readString(strategyId, params, 'collateralAsset');
  const poolId = readString(strategyId, params, 'poolId');
  const maxCollateral = readBigInt(strategyId, params, 'maxCollateral');
  const maxPrice = readBigInt(strategyId, params, 'maxPrice');
  const minSwapOutput = 'minSwapOutput' in params ? readBigInt(strategyId, params, 'minSwapOutput') : 0n;
  if (maxCollateral <= 0n || maxPrice <= 0n || minSwapOutput < 0n) {
    throw new InvalidStrategyParamsError(strategyId, 'maxCollateral and maxPrice must be positive');
  }

  return { owner, collateralAsset, poolId, maxCollateral, maxPrice, minSwapOutput };
}

function readString(strategyId: string, params: object, field: string): string {
  const value: unknown = field in params ? Reflect.get(params, field) : undefined;
  if (typeof value != 'string' || value.length == 0) {
    throw new InvalidStrategyParamsError(strategyId, `${field} must be a non empty string`);
  }
  return value;
}

function readBigInt(strategyId: string, params: object, field: string): bigint {
  const value: unknown = field in params ? Reflect.get(params, field) : undefined;
  if (typeof value != 'bigint') {
    throw new InvalidStrategyParamsError(strategyId, `${field} must be a bigint`);
  }
  return value;
}
